// Constants
export {
  SLIDE_W_IN,
  SLIDE_H_IN,
  MAX_BULLETS,
  DEFAULT_BASE_URL,
  DEFAULT_CHAT_MODEL,
  DEFAULT_IMAGE_MODEL,
  DEFAULT_OUT_PATH,
} from "./constants.js";

// Errors
export {
  DeckError,
  UsageError,
  ConfigError,
  UpstreamError,
  OutlineError,
  OutputError,
} from "./errors.js";

// Schema types
export type { Outline, Slide } from "./schema/outline.js";
export {
  parseOutline,
  OutlineSchema,
  SlideSchema,
  SlideType,
  OUTLINE_JSON_SCHEMA,
} from "./schema/outline.js";

// Configuration
export type { DeckConfig } from "./config.js";
export {
  loadConfig,
  requireApiKey,
  resolveImageFailurePolicy,
  ImageFailurePolicy,
} from "./config.js";

// Providers
export { OpenAIClient } from "./llm/openai-client.js";
export type { ChatClient, ImageClient, OpenAIClientOptions } from "./llm/openai-client.js";
export { OpenAIImageProvider } from "./images/image-provider.js";
export type { ImageProvider } from "./images/image-provider.js";

// Pipeline stages
export { SlidePlanner, parseModelJSON } from "./planner/slide-planner.js";
export type { OutlinePlanner } from "./planner/slide-planner.js";
export { ImageService, NO_IMAGE } from "./images/image-service.js";
export type { SlideImage, ImageServiceOptions } from "./images/image-service.js";
export { DeckBuilder, buildDeck } from "./deck/deck-builder.js";
export { generateDeck } from "./pipeline/generate-deck.js";
export type { GenerateDeckOptions, GenerateDeckResult } from "./pipeline/generate-deck.js";

// CLI
export { runCli, parseCliArgs } from "./cli/run-cli.js";

// FS helpers
export { readJSON, writeJSON, writeFile } from "./utils/fs-helpers.js";
