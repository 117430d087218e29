import { z } from "zod";
import {
  DEFAULT_BASE_URL,
  DEFAULT_CHAT_MODEL,
  DEFAULT_IMAGE_MODEL,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { formatIssues } from "./schema/outline.js";

/**
 * What to do when a single slide's image cannot be generated:
 *   abort:       fail the whole run
 *   placeholder: keep the slide and draw a labelled frame in the image slot
 *   omit:        keep the slide as text only
 */
export const ImageFailurePolicy = z.enum(["abort", "placeholder", "omit"]);
export type ImageFailurePolicy = z.infer<typeof ImageFailurePolicy>;

/** Trimmed string; empty counts as unset */
const optionalString = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: optionalString,
  USE_OPENAI_IMAGES: optionalString,
  OPENAI_IMAGE_MODEL: optionalString,
  IMAGE_FAILURE_POLICY: optionalString,
});

export interface DeckConfig {
  apiKey?: string;
  baseURL: string;
  model: string;
  useImages: boolean;
  imageModel: string;
  /** Raw IMAGE_FAILURE_POLICY; checked by resolveImageFailurePolicy */
  imageFailurePolicy?: string;
}

/** Build the run configuration from environment variables. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): DeckConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid environment: ${formatIssues(parsed.error).join("; ")}`
    );
  }
  const vars = parsed.data;
  const useFlag = vars.USE_OPENAI_IMAGES?.toLowerCase();

  return {
    apiKey: vars.OPENAI_API_KEY,
    baseURL: (vars.OPENAI_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    model: vars.OPENAI_MODEL ?? DEFAULT_CHAT_MODEL,
    useImages: useFlag === "1" || useFlag === "true",
    imageModel: vars.OPENAI_IMAGE_MODEL ?? DEFAULT_IMAGE_MODEL,
    imageFailurePolicy: vars.IMAGE_FAILURE_POLICY,
  };
}

/** Return the API key or throw a ConfigError naming the variable. */
export function requireApiKey(config: DeckConfig): string {
  if (!config.apiKey) {
    throw new ConfigError("OPENAI_API_KEY is required");
  }
  return config.apiKey;
}

/**
 * Pick the image failure policy: the CLI override wins, then
 * IMAGE_FAILURE_POLICY, then "placeholder". The variable is only validated
 * when it is the value actually used.
 */
export function resolveImageFailurePolicy(
  config: DeckConfig,
  override?: ImageFailurePolicy
): ImageFailurePolicy {
  if (override) return override;
  if (config.imageFailurePolicy === undefined) return "placeholder";
  const policy = ImageFailurePolicy.safeParse(config.imageFailurePolicy);
  if (!policy.success) {
    throw new ConfigError(
      `IMAGE_FAILURE_POLICY must be one of ${ImageFailurePolicy.options.join(", ")}`
    );
  }
  return policy.data;
}
