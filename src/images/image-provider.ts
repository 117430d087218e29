import type { ImageClient } from "../llm/openai-client.js";

/** Turns a text prompt into image bytes */
export interface ImageProvider {
  generate(prompt: string): Promise<Buffer>;
}

export class OpenAIImageProvider implements ImageProvider {
  constructor(private readonly client: ImageClient) {}

  generate(prompt: string): Promise<Buffer> {
    return this.client.generateImage(prompt);
  }
}
