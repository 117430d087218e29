import { parseArgs } from "node:util";
import {
  ImageFailurePolicy,
  type DeckConfig,
  loadConfig,
  requireApiKey,
  resolveImageFailurePolicy,
} from "../config.js";
import { DEFAULT_OUT_PATH, IMAGES_DIRNAME } from "../constants.js";
import { DeckError, UsageError, errorMessage } from "../errors.js";
import { OpenAIImageProvider } from "../images/image-provider.js";
import { ImageService } from "../images/image-service.js";
import { type ChatClient, type ImageClient, OpenAIClient } from "../llm/openai-client.js";
import { generateDeck } from "../pipeline/generate-deck.js";
import { SlidePlanner } from "../planner/slide-planner.js";
import { type Outline, parseOutline } from "../schema/outline.js";
import { defaultImagesDir, readJSON } from "../utils/fs-helpers.js";

export const USAGE = `Usage: deckforge "<topic>" [--out <file.pptx>] [options]

Options:
  --out <path>              Output deck (default: ${DEFAULT_OUT_PATH})
  --images <dir>            Image directory (default: ${IMAGES_DIRNAME}/ beside --out)
  --outline <file.json>     Build from a saved outline instead of calling the planner
  --save-outline <file>     Also write the outline JSON
  --on-image-error <policy> abort | placeholder | omit (default: IMAGE_FAILURE_POLICY or placeholder)
  -h, --help                Show this help

Environment:
  OPENAI_API_KEY, OPENAI_BASE_URL, OPENAI_MODEL,
  USE_OPENAI_IMAGES (1 to enable), OPENAI_IMAGE_MODEL, IMAGE_FAILURE_POLICY

Exit codes: 0 = success, 1 = generation failed, 2 = usage or configuration error.`;

export interface CliOptions {
  topic?: string;
  outPath: string;
  imagesDir: string;
  outlinePath?: string;
  saveOutlinePath?: string;
  imageFailurePolicy?: ImageFailurePolicy;
}

export type ParsedCli = { help: true } | { help: false; options: CliOptions };

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        out: { type: "string" },
        images: { type: "string" },
        outline: { type: "string" },
        "save-outline": { type: "string" },
        "on-image-error": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}

/** Parse argv (without node and script). Throws UsageError. */
export function parseCliArgs(argv: string[]): ParsedCli {
  const { values, positionals } = readArgs(argv);

  if (values.help) return { help: true };

  if (positionals.length > 1) {
    throw new UsageError(
      `Expected a single topic argument, got ${positionals.length} (quote the topic)`
    );
  }
  const topic = positionals[0]?.trim() || undefined;
  if (!topic && !values.outline) {
    throw new UsageError("A topic is required (or --outline <file.json>)");
  }

  let imageFailurePolicy: ImageFailurePolicy | undefined;
  if (values["on-image-error"] !== undefined) {
    const policy = ImageFailurePolicy.safeParse(values["on-image-error"]);
    if (!policy.success) {
      throw new UsageError(
        `--on-image-error must be one of ${ImageFailurePolicy.options.join(", ")}`
      );
    }
    imageFailurePolicy = policy.data;
  }

  const outPath = values.out ?? DEFAULT_OUT_PATH;
  return {
    help: false,
    options: {
      topic,
      outPath,
      imagesDir: values.images ?? defaultImagesDir(outPath, IMAGES_DIRNAME),
      outlinePath: values.outline,
      saveOutlinePath: values["save-outline"],
      imageFailurePolicy,
    },
  };
}

export interface CliDeps {
  createClient(config: DeckConfig): ChatClient & ImageClient;
}

export const defaultDeps: CliDeps = {
  createClient: (config) =>
    new OpenAIClient({
      apiKey: requireApiKey(config),
      baseURL: config.baseURL,
      model: config.model,
      imageModel: config.imageModel,
    }),
};

/**
 * Run one generation. Status goes to stderr, the result line to stdout.
 * Returns the process exit code.
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  deps: CliDeps = defaultDeps
): Promise<number> {
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.help) {
      console.log(USAGE);
      return 0;
    }
    const { options } = parsed;
    const config = loadConfig(env);

    let outline: Outline | undefined;
    if (options.outlinePath) {
      let data: unknown;
      try {
        data = await readJSON(options.outlinePath);
      } catch (err) {
        throw new UsageError(
          `Cannot read outline ${options.outlinePath}: ${errorMessage(err)}`
        );
      }
      outline = parseOutline(data);
      console.error(`Loaded outline from ${options.outlinePath}`);
    }

    // Only build the API client when something will call it.
    let client: (ChatClient & ImageClient) | undefined;
    const getClient = () => (client ??= deps.createClient(config));

    const planner = outline ? undefined : new SlidePlanner(getClient());
    const images = config.useImages
      ? new ImageService({
          outputDir: options.imagesDir,
          provider: new OpenAIImageProvider(getClient()),
          policy: resolveImageFailurePolicy(config, options.imageFailurePolicy),
          log: (message) => console.error(message),
        })
      : undefined;

    const result = await generateDeck({
      topic: options.topic,
      outPath: options.outPath,
      planner,
      outline,
      images,
      saveOutlinePath: options.saveOutlinePath,
      log: (message) => console.error(message),
    });

    console.log(`PPTX written to ${result.outPath} (${result.slideCount} slides)`);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return err.exitCode;
    }
    if (err instanceof DeckError) {
      console.error(`Error: ${err.message}`);
      return err.exitCode;
    }
    console.error("Error:", errorMessage(err));
    return 1;
  }
}
