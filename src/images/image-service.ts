import * as path from "node:path";
import type { ImageFailurePolicy } from "../config.js";
import type { Outline } from "../schema/outline.js";
import { OutputError, UpstreamError, errorMessage } from "../errors.js";
import { slideImageName, writeFile } from "../utils/fs-helpers.js";
import type { ImageProvider } from "./image-provider.js";

/** What the assembler gets for one slide's image slot */
export type SlideImage =
  | { kind: "file"; path: string }
  | { kind: "placeholder"; prompt: string; reason: string }
  | { kind: "none" };

export const NO_IMAGE: SlideImage = { kind: "none" };

export interface ImageServiceOptions {
  outputDir: string;
  provider: ImageProvider;
  policy: ImageFailurePolicy;
  log?: (message: string) => void;
}

/**
 * Generates one image per slide, in slide order, and persists each under
 * `outputDir/slide_NN.png`. Provider failures are resolved by the configured
 * policy; write failures always abort.
 */
export class ImageService {
  private readonly log: (message: string) => void;

  constructor(private readonly options: ImageServiceOptions) {
    this.log = options.log ?? (() => {});
  }

  get outputDir(): string {
    return this.options.outputDir;
  }

  /** Only content slides carry an image slot; other slides get NO_IMAGE. */
  async generateForOutline(outline: Outline): Promise<SlideImage[]> {
    const images: SlideImage[] = [];
    for (const [i, slide] of outline.slides.entries()) {
      if (slide.slide_type !== "content") {
        images.push(NO_IMAGE);
        continue;
      }
      images.push(await this.generateImage(slide.image_prompt, slideImageName(i + 1)));
    }
    return images;
  }

  async generateImage(prompt: string, filename: string): Promise<SlideImage> {
    let bytes: Buffer;
    try {
      bytes = await this.options.provider.generate(prompt);
    } catch (err) {
      return this.onFailure(prompt, filename, err);
    }

    const target = path.join(this.options.outputDir, filename);
    try {
      await writeFile(target, bytes);
    } catch (err) {
      throw new OutputError(`Cannot write image ${target}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.log(`Image saved: ${target}`);
    return { kind: "file", path: target };
  }

  private onFailure(prompt: string, filename: string, err: unknown): SlideImage {
    const reason = errorMessage(err);
    switch (this.options.policy) {
      case "abort":
        if (err instanceof UpstreamError) throw err;
        throw new UpstreamError(`Image generation failed for ${filename}: ${reason}`, {
          cause: err,
        });
      case "placeholder":
        this.log(`Image failed for ${filename}, using placeholder: ${reason}`);
        return { kind: "placeholder", prompt, reason };
      case "omit":
        this.log(`Image failed for ${filename}, omitting: ${reason}`);
        return NO_IMAGE;
    }
  }
}
