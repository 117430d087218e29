import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { generateDeck } from "../../src/pipeline/generate-deck.js";
import { SlidePlanner } from "../../src/planner/slide-planner.js";
import { ImageService } from "../../src/images/image-service.js";
import { OpenAIImageProvider } from "../../src/images/image-provider.js";
import { ConfigError, OutlineError } from "../../src/errors.js";
import { readJSON } from "../../src/utils/fs-helpers.js";
import {
  FakeChatClient,
  FakeImageClient,
  countSlides,
  loadSampleOutline,
  makeTempDir,
  mediaEntries,
  openDeck,
} from "../helpers/fakes.js";

function outlineJSON(slideCount: number): string {
  return JSON.stringify({
    topic: "Volcanoes",
    slides: Array.from({ length: slideCount }, (_, i) => ({
      slide_type: i === 0 ? "title" : "content",
      heading: `Slide ${i + 1}`,
      bullet_points: [`Point ${i + 1}`],
      image_prompt: `Volcano picture ${i + 1}`,
    })),
  });
}

describe("generateDeck", () => {
  let tmp: ReturnType<typeof makeTempDir>;
  let outPath: string;

  beforeEach(() => {
    tmp = makeTempDir();
    outPath = path.join(tmp.dir, "output", "presentation.pptx");
  });

  afterEach(() => tmp.cleanup());

  for (const count of [1, 3, 7]) {
    it(`writes ${count} slides for a ${count}-slide outline`, async () => {
      const planner = new SlidePlanner(new FakeChatClient([outlineJSON(count)]));
      const result = await generateDeck({ topic: "Volcanoes", outPath, planner });

      expect(result.slideCount).toBe(count);
      expect(countSlides(await openDeck(outPath))).toBe(count);
    });
  }

  it("builds a text-only deck when images are disabled", async () => {
    const planner = new SlidePlanner(new FakeChatClient([outlineJSON(3)]));
    const result = await generateDeck({ topic: "Volcanoes", outPath, planner });

    expect(result.images).toEqual([{ kind: "none" }, { kind: "none" }, { kind: "none" }]);
    expect(mediaEntries(await openDeck(outPath))).toEqual([]);
    expect(fs.existsSync(path.join(tmp.dir, "output", "images"))).toBe(false);
  });

  it("embeds generated images when enabled", async () => {
    const client = new FakeImageClient();
    const imagesDir = path.join(tmp.dir, "output", "images");
    const result = await generateDeck({
      topic: "Volcanoes",
      outPath,
      planner: new SlidePlanner(new FakeChatClient([outlineJSON(3)])),
      images: new ImageService({
        outputDir: imagesDir,
        provider: new OpenAIImageProvider(client),
        policy: "abort",
      }),
    });

    expect(client.prompts).toEqual(["Volcano picture 2", "Volcano picture 3"]);
    expect(result.images[1]).toEqual({
      kind: "file",
      path: path.join(imagesDir, "slide_02.png"),
    });
    expect(mediaEntries(await openDeck(outPath))).toHaveLength(2);
  });

  it("writes nothing when the planner output cannot be parsed", async () => {
    const planner = new SlidePlanner(new FakeChatClient(["nope", "still nope"]));
    await expect(
      generateDeck({ topic: "Volcanoes", outPath, planner })
    ).rejects.toBeInstanceOf(OutlineError);
    expect(fs.existsSync(outPath)).toBe(false);
    expect(fs.existsSync(path.dirname(outPath))).toBe(false);
  });

  it("overwrites the previous deck on a re-run", async () => {
    await generateDeck({
      topic: "Volcanoes",
      outPath,
      planner: new SlidePlanner(new FakeChatClient([outlineJSON(5)])),
    });
    await generateDeck({
      topic: "Volcanoes",
      outPath,
      planner: new SlidePlanner(new FakeChatClient([outlineJSON(2)])),
    });
    expect(countSlides(await openDeck(outPath))).toBe(2);
  });

  it("builds from a supplied outline without a planner", async () => {
    const outline = await loadSampleOutline();
    const result = await generateDeck({ outPath, outline });
    expect(result.slideCount).toBe(4);
  });

  it("saves the outline JSON when asked", async () => {
    const outline = await loadSampleOutline();
    const saved = path.join(tmp.dir, "plans", "outline.json");
    await generateDeck({ outPath, outline, saveOutlinePath: saved });
    expect(await readJSON(saved)).toEqual(outline);
  });

  it("requires a planner or an outline", async () => {
    await expect(generateDeck({ topic: "x", outPath })).rejects.toBeInstanceOf(ConfigError);
  });

  it("logs progress", async () => {
    const lines: string[] = [];
    await generateDeck({
      topic: "Volcanoes",
      outPath,
      planner: new SlidePlanner(new FakeChatClient([outlineJSON(2)])),
      log: (line) => lines.push(line),
    });
    expect(lines).toEqual(['Planning slides for "Volcanoes"...', "Outline: 2 slides"]);
  });
});
