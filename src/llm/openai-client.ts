import OpenAI from "openai";
import {
  CHAT_TIMEOUT_MS,
  IMAGE_SIZE,
  IMAGE_TIMEOUT_MS,
  PLANNER_TEMPERATURE,
} from "../constants.js";
import { UpstreamError, errorMessage } from "../errors.js";

/** Anything that can answer a system + user prompt with text */
export interface ChatClient {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

/** Anything that can turn a prompt into image bytes */
export interface ImageClient {
  generateImage(prompt: string): Promise<Buffer>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  imageModel: string;
  /** Replaces the global fetch for API calls and image downloads */
  fetch?: typeof fetch;
}

/**
 * Thin adapter over the OpenAI SDK for one chat-completion call and one
 * image-generation call. SDK retries are disabled; every failure surfaces
 * as an UpstreamError.
 */
export class OpenAIClient implements ChatClient, ImageClient {
  private readonly sdk: OpenAI;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAIClientOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.sdk = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
      fetch: this.fetchImpl,
    });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.sdk.chat.completions.create(
        {
          model: this.options.model,
          temperature: PLANNER_TEMPERATURE,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
        },
        { timeout: CHAT_TIMEOUT_MS }
      );
      content = response.choices[0]?.message.content;
    } catch (err) {
      throw new UpstreamError(`Chat completion failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!content) {
      throw new UpstreamError("Chat completion returned no content");
    }
    return content;
  }

  async generateImage(prompt: string): Promise<Buffer> {
    let image: { b64_json?: string; url?: string } | undefined;
    try {
      const response = await this.sdk.images.generate(
        {
          model: this.options.imageModel,
          prompt,
          size: IMAGE_SIZE,
          n: 1,
        },
        { timeout: IMAGE_TIMEOUT_MS }
      );
      image = response.data?.[0];
    } catch (err) {
      throw new UpstreamError(`Image generation failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (image?.b64_json) {
      return Buffer.from(image.b64_json, "base64");
    }
    if (image?.url) {
      return this.download(image.url);
    }
    throw new UpstreamError("Image response contained neither b64_json nor url");
  }

  private async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(IMAGE_TIMEOUT_MS),
      });
    } catch (err) {
      throw new UpstreamError(`Image download failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!response.ok) {
      throw new UpstreamError(
        `Image download failed: HTTP ${response.status} for ${url}`
      );
    }
    return Buffer.from(await response.arrayBuffer());
  }
}
