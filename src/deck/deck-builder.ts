import * as fs from "node:fs/promises";
import PptxGenJSImport from "pptxgenjs";
import {
  BODY_FONT_PT,
  COLOR_ACCENT,
  COLOR_MUTED,
  COLOR_TEXT,
  FONT_FACE,
  LAYOUT_NAME,
  PLACEHOLDER_FILL,
  PLACEHOLDER_LINE,
  SLIDE_H_IN,
  SLIDE_W_IN,
} from "../constants.js";
import { OutputError, errorMessage } from "../errors.js";
import type { SlideImage } from "../images/image-service.js";
import type { Outline, Slide } from "../schema/outline.js";
import { fileExists, writeFile } from "../utils/fs-helpers.js";

type Unwrapped<T> = T extends { default: infer D } ? D : T;
type PptxGenJSClass = Unwrapped<typeof PptxGenJSImport>;
type Presentation = InstanceType<PptxGenJSClass>;
type PptxSlide = ReturnType<Presentation["addSlide"]>;

/**
 * pptxgenjs ships a namespace + default-class declaration. Depending on the
 * loader the default import is either the class itself or a CJS wrapper whose
 * `default` is the class, so pick whichever is callable.
 */
function loadPptxGenJS(): PptxGenJSClass {
  const mod: unknown = PptxGenJSImport;
  const candidate =
    typeof mod === "object" && mod !== null && "default" in mod
      ? mod.default
      : mod;
  if (typeof candidate !== "function") {
    throw new Error("pptxgenjs did not export a constructor");
  }
  return candidate as PptxGenJSClass;
}

/** Shorten a prompt for the placeholder label */
export function placeholderLabel(prompt: string, max = 60): string {
  const chars = Array.from(prompt);
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : prompt;
}

/**
 * Builds a deck slide by slide with pptxgenjs.
 * Geometry is in inches on a 10" × 5.625" (16:9) slide.
 */
export class DeckBuilder {
  private readonly pres: Presentation;
  private count = 0;

  constructor(title?: string) {
    const PptxGenJS = loadPptxGenJS();
    this.pres = new PptxGenJS();
    this.pres.defineLayout({ name: LAYOUT_NAME, width: SLIDE_W_IN, height: SLIDE_H_IN });
    this.pres.layout = LAYOUT_NAME;
    if (title) {
      this.pres.title = title;
    }
  }

  /** Number of slides added so far */
  get slideCount(): number {
    return this.count;
  }

  /**
   * Append one slide. A `file` image must exist on disk; only content slides
   * have an image slot, other slide types ignore the image.
   */
  async addSlide(slide: Slide, image: SlideImage = { kind: "none" }): Promise<void> {
    let imageData: string | undefined;
    if (image.kind === "file") {
      if (!(await fileExists(image.path))) {
        throw new OutputError(`Image not found: ${image.path}`);
      }
      const bytes = await fs.readFile(image.path);
      imageData = `image/png;base64,${bytes.toString("base64")}`;
    }

    const s = this.pres.addSlide();
    switch (slide.slide_type) {
      case "title":
        this.addTitleSlide(s, slide);
        break;
      case "section":
        this.addSectionSlide(s, slide);
        break;
      case "content":
        this.addContentSlide(s, slide, image, imageData);
        break;
    }
    this.count++;
  }

  /** Render the deck as a PPTX (zip) buffer */
  async toBuffer(): Promise<Buffer> {
    const out = await this.pres.write({ outputType: "nodebuffer" });
    if (out instanceof Uint8Array) return Buffer.from(out);
    if (out instanceof ArrayBuffer) return Buffer.from(out);
    throw new Error(`pptxgenjs returned unexpected output type: ${typeof out}`);
  }

  /** Write the deck to `filePath`, creating parent directories and overwriting. */
  async save(filePath: string): Promise<void> {
    const buffer = await this.toBuffer();
    try {
      await writeFile(filePath, buffer);
    } catch (err) {
      throw new OutputError(`Cannot write ${filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private addTitleSlide(s: PptxSlide, slide: Slide): void {
    s.addShape(this.pres.ShapeType.rect, {
      x: 0,
      y: SLIDE_H_IN - 0.35,
      w: SLIDE_W_IN,
      h: 0.35,
      fill: { color: COLOR_ACCENT },
    });
    s.addText(slide.heading, {
      x: 0.5,
      y: 1.5,
      w: SLIDE_W_IN - 1,
      h: 1.3,
      fontSize: 40,
      bold: true,
      color: COLOR_TEXT,
      fontFace: FONT_FACE,
      align: "center",
      valign: "middle",
      wrap: true,
    });
    if (slide.bullet_points.length > 0) {
      s.addText(slide.bullet_points.join("\n"), {
        x: 1,
        y: 3.0,
        w: SLIDE_W_IN - 2,
        h: 1.4,
        fontSize: 20,
        color: COLOR_MUTED,
        fontFace: FONT_FACE,
        align: "center",
        valign: "top",
        wrap: true,
      });
    }
  }

  private addSectionSlide(s: PptxSlide, slide: Slide): void {
    s.addShape(this.pres.ShapeType.rect, {
      x: 0,
      y: 0,
      w: 0.25,
      h: SLIDE_H_IN,
      fill: { color: COLOR_ACCENT },
    });
    s.addText(slide.heading, {
      x: 0.7,
      y: 1.1,
      w: SLIDE_W_IN - 1.4,
      h: 1.0,
      fontSize: 34,
      bold: true,
      color: COLOR_TEXT,
      fontFace: FONT_FACE,
      valign: "middle",
    });
    if (slide.bullet_points.length > 0) {
      s.addText(this.bulletRows(slide.bullet_points), {
        x: 0.7,
        y: 2.3,
        w: SLIDE_W_IN - 1.4,
        h: 2.8,
        valign: "top",
      });
    }
  }

  private addContentSlide(
    s: PptxSlide,
    slide: Slide,
    image: SlideImage,
    imageData: string | undefined
  ): void {
    s.addText(slide.heading, {
      x: 0.5,
      y: 0.3,
      w: SLIDE_W_IN - 1,
      h: 0.9,
      fontSize: 28,
      bold: true,
      color: COLOR_TEXT,
      fontFace: FONT_FACE,
      valign: "middle",
    });

    const hasImageSlot = image.kind !== "none";
    if (slide.bullet_points.length > 0) {
      s.addText(this.bulletRows(slide.bullet_points), {
        x: 0.7,
        y: 1.4,
        w: hasImageSlot ? 5.4 : SLIDE_W_IN - 1.4,
        h: 3.8,
        valign: "top",
      });
    }

    const frame = { x: 6.4, y: 1.4, w: 3.1, h: 3.1 };
    if (imageData) {
      s.addImage({ data: imageData, ...frame });
    } else if (image.kind === "placeholder") {
      s.addShape(this.pres.ShapeType.rect, {
        ...frame,
        fill: { color: PLACEHOLDER_FILL },
        line: { color: PLACEHOLDER_LINE, width: 1 },
      });
      s.addText(placeholderLabel(image.prompt), {
        ...frame,
        fontSize: 12,
        color: COLOR_MUTED,
        fontFace: FONT_FACE,
        align: "center",
        valign: "middle",
        wrap: true,
      });
    }
  }

  private bulletRows(points: string[]) {
    return points.map((text) => ({
      text,
      options: {
        bullet: true,
        fontSize: BODY_FONT_PT,
        color: COLOR_TEXT,
        fontFace: FONT_FACE,
      },
    }));
  }
}

/**
 * Build a full deck from an outline and its per-slide images
 * (`images[i]` belongs to `outline.slides[i]`).
 */
export async function buildDeck(
  outline: Outline,
  images: readonly SlideImage[] = []
): Promise<DeckBuilder> {
  const builder = new DeckBuilder(outline.topic);
  for (const [i, slide] of outline.slides.entries()) {
    await builder.addSlide(slide, images[i]);
  }
  return builder;
}
