/** Slide dimensions (inches). Standard PowerPoint 16:9. */
export const SLIDE_W_IN = 10;
export const SLIDE_H_IN = 5.625;

/** Custom layout name registered with pptxgenjs */
export const LAYOUT_NAME = "DECK_16x9";

/** Maximum bullet points per slide accepted from the planner */
export const MAX_BULLETS = 5;

/** Slide count range requested from the planner */
export const MIN_SLIDES_REQUESTED = 6;
export const MAX_SLIDES_REQUESTED = 10;

/** Chat sampling temperature for outline planning */
export const PLANNER_TEMPERATURE = 0.4;

/** Request timeouts (ms) */
export const CHAT_TIMEOUT_MS = 60_000;
export const IMAGE_TIMEOUT_MS = 120_000;

/** Requested image size */
export const IMAGE_SIZE = "1024x1024" as const;

/** Provider defaults */
export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
export const DEFAULT_IMAGE_MODEL = "gpt-image-1";

/** CLI defaults */
export const DEFAULT_OUT_PATH = "output/presentation.pptx";
export const IMAGES_DIRNAME = "images";

/** Body text size for content slides (pt) */
export const BODY_FONT_PT = 20;

/** Palette (6-char hex, no #) */
export const COLOR_TEXT = "1E293B";
export const COLOR_MUTED = "64748B";
export const COLOR_ACCENT = "2563EB";
export const PLACEHOLDER_FILL = "E2E8F0";
export const PLACEHOLDER_LINE = "94A3B8";

export const FONT_FACE = "Arial";
