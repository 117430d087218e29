import type { ChatClient } from "../llm/openai-client.js";
import { type Outline, parseOutline } from "../schema/outline.js";
import { OutlineError, UsageError, errorMessage } from "../errors.js";
import { SYSTEM_PROMPT, buildPlanPrompt, buildRepairPrompt } from "./prompts.js";

/** Produces an outline for a topic */
export interface OutlinePlanner {
  plan(topic: string): Promise<Outline>;
}

/**
 * Strip whitespace and one surrounding ``` fence (with optional language tag),
 * then parse as JSON. Throws OutlineError when the text is not JSON.
 */
export function parseModelJSON(content: string): unknown {
  let text = content.trim();
  const fenced = text.match(/^```[\w-]*\s*\n([\s\S]*?)\n?```$/);
  if (fenced) {
    text = fenced[1]!.trim();
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new OutlineError(`Model output is not JSON: ${errorMessage(err)}`, [], {
      cause: err,
    });
  }
}

/**
 * Asks the chat model for an outline. One invalid answer gets a single repair
 * round-trip; a second invalid answer is an OutlineError. Transport failures
 * from the client propagate unchanged.
 */
export class SlidePlanner implements OutlinePlanner {
  constructor(private readonly client: ChatClient) {}

  async plan(topic: string): Promise<Outline> {
    const trimmed = topic.trim();
    if (!trimmed) {
      throw new UsageError("Topic must be a non-empty string");
    }

    const first = await this.client.complete(SYSTEM_PROMPT, buildPlanPrompt(trimmed));
    try {
      return parseOutline(parseModelJSON(first));
    } catch (err) {
      if (!(err instanceof OutlineError)) throw err;
    }

    const repaired = await this.client.complete(
      SYSTEM_PROMPT,
      buildRepairPrompt(trimmed, first)
    );
    try {
      return parseOutline(parseModelJSON(repaired));
    } catch (err) {
      if (err instanceof OutlineError) {
        throw new OutlineError(
          `AI output is invalid after repair: ${err.message}`,
          err.issues,
          { cause: err }
        );
      }
      throw err;
    }
  }
}
