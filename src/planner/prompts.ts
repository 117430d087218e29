import {
  MAX_BULLETS,
  MAX_SLIDES_REQUESTED,
  MIN_SLIDES_REQUESTED,
} from "../constants.js";
import { OUTLINE_JSON_SCHEMA, SlideType } from "../schema/outline.js";

export const SYSTEM_PROMPT =
  "You are a slide planning assistant. Return ONLY valid JSON. " +
  "No markdown, no commentary, no code fences. " +
  "The JSON must strictly follow the provided schema.";

export function buildPlanPrompt(topic: string): string {
  return [
    `Topic: ${topic}`,
    `Create a slide plan JSON with ${MIN_SLIDES_REQUESTED}-${MAX_SLIDES_REQUESTED} slides, ` +
      `shaped as {"topic": string, "slides": [...]}.`,
    `Use slide_type in [${SlideType.options.join(", ")}].`,
    `Each slide must include: slide_type, heading, bullet_points (max ${MAX_BULLETS}), image_prompt.`,
    "Ensure bullet_points is an array (may be empty for title).",
  ].join("\n");
}

export function buildRepairPrompt(topic: string, badOutput: string): string {
  return [
    "The previous output was invalid. Fix it to be valid JSON ONLY.",
    "Do not add markdown or code fences.",
    `Schema reminder: ${JSON.stringify(OUTLINE_JSON_SCHEMA)}`,
    `Invalid output: ${badOutput}`,
    `Topic: ${topic}`,
  ].join("\n");
}
