import { ConfigError } from "../errors.js";
import { type SlideImage, type ImageService, NO_IMAGE } from "../images/image-service.js";
import type { OutlinePlanner } from "../planner/slide-planner.js";
import type { Outline } from "../schema/outline.js";
import { buildDeck } from "../deck/deck-builder.js";
import { writeJSON } from "../utils/fs-helpers.js";

export interface GenerateDeckOptions {
  /** Topic for the planner; ignored when `outline` is supplied */
  topic?: string;
  /** Destination .pptx path; overwritten if present */
  outPath: string;
  planner?: OutlinePlanner;
  /** Pre-built outline; skips the planner */
  outline?: Outline;
  /** Omit to disable image generation */
  images?: ImageService;
  /** Also write the outline JSON here */
  saveOutlinePath?: string;
  log?: (message: string) => void;
}

export interface GenerateDeckResult {
  outPath: string;
  outline: Outline;
  slideCount: number;
  images: SlideImage[];
}

/**
 * topic → outline → (outline + images) → file.
 *
 * The outline is validated before anything touches the disk, and the deck is
 * rendered fully in memory before the single write of `outPath`.
 */
export async function generateDeck(
  options: GenerateDeckOptions
): Promise<GenerateDeckResult> {
  const log = options.log ?? (() => {});

  let outline: Outline;
  if (options.outline) {
    outline = options.outline;
  } else if (options.planner) {
    log(`Planning slides for "${options.topic ?? ""}"...`);
    outline = await options.planner.plan(options.topic ?? "");
  } else {
    throw new ConfigError("Either an outline or a planner is required");
  }
  log(`Outline: ${outline.slides.length} slides`);

  if (options.saveOutlinePath) {
    await writeJSON(options.saveOutlinePath, outline);
    log(`Outline saved to ${options.saveOutlinePath}`);
  }

  let images: SlideImage[];
  if (options.images) {
    log(`Generating images into ${options.images.outputDir}`);
    images = await options.images.generateForOutline(outline);
  } else {
    images = outline.slides.map(() => NO_IMAGE);
  }

  const deck = await buildDeck(outline, images);
  await deck.save(options.outPath);

  return {
    outPath: options.outPath,
    outline,
    slideCount: deck.slideCount,
    images,
  };
}
