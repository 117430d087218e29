import { z } from "zod";
import { MAX_BULLETS } from "../constants.js";
import { OutlineError } from "../errors.js";

export const SlideType = z.enum(["title", "section", "content"]);
export type SlideType = z.infer<typeof SlideType>;

export const SlideSchema = z
  .object({
    slide_type: SlideType,
    heading: z.string().min(1),
    bullet_points: z.array(z.string().min(1)).max(MAX_BULLETS),
    image_prompt: z.string().min(1),
  })
  .strict();
export type Slide = z.infer<typeof SlideSchema>;

export const OutlineSchema = z
  .object({
    topic: z.string().min(1),
    slides: z.array(SlideSchema).min(1),
  })
  .strict();
export type Outline = z.infer<typeof OutlineSchema>;

/**
 * JSON-schema rendering of {@link OutlineSchema}, quoted back to the model
 * when its first answer has to be repaired.
 */
export const OUTLINE_JSON_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["topic", "slides"],
  properties: {
    topic: { type: "string", minLength: 1 },
    slides: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        additionalProperties: false,
        required: ["slide_type", "heading", "bullet_points", "image_prompt"],
        properties: {
          slide_type: { type: "string", enum: SlideType.options },
          heading: { type: "string", minLength: 1 },
          bullet_points: {
            type: "array",
            maxItems: MAX_BULLETS,
            items: { type: "string", minLength: 1 },
          },
          image_prompt: { type: "string", minLength: 1 },
        },
      },
    },
  },
} as const;

/** Format zod issues as `path: message` lines */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/** Parse and validate an outline document. Throws OutlineError on invalid input. */
export function parseOutline(data: unknown): Outline {
  const result = OutlineSchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new OutlineError(`Invalid outline: ${issues.join("; ")}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}
