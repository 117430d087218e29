import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ImageService } from "../../src/images/image-service.js";
import { OpenAIImageProvider } from "../../src/images/image-provider.js";
import { OutputError, UpstreamError } from "../../src/errors.js";
import { slideImageName } from "../../src/utils/fs-helpers.js";
import type { Outline } from "../../src/schema/outline.js";
import {
  FakeImageClient,
  TINY_PNG,
  loadSampleOutline,
  makeTempDir,
} from "../helpers/fakes.js";

describe("slideImageName", () => {
  it("zero-pads to two digits", () => {
    expect(slideImageName(1)).toBe("slide_01.png");
    expect(slideImageName(12)).toBe("slide_12.png");
  });
});

describe("ImageService", () => {
  let tmp: ReturnType<typeof makeTempDir>;
  let outline: Outline;

  beforeEach(async () => {
    tmp = makeTempDir();
    outline = await loadSampleOutline();
  });

  afterEach(() => tmp.cleanup());

  const service = (
    client: FakeImageClient,
    policy: "abort" | "placeholder" | "omit",
    outputDir = path.join(tmp.dir, "out", "images")
  ) => new ImageService({ outputDir, provider: new OpenAIImageProvider(client), policy });

  it("generates images for content slides only, named by slide position", async () => {
    const client = new FakeImageClient();
    const images = await service(client, "abort").generateForOutline(outline);

    const dir = path.join(tmp.dir, "out", "images");
    expect(images).toEqual([
      { kind: "none" },
      { kind: "none" },
      { kind: "file", path: path.join(dir, "slide_03.png") },
      { kind: "file", path: path.join(dir, "slide_04.png") },
    ]);
    expect(client.prompts).toEqual([
      "Beekeeping tools laid out on a table",
      "Honey dripping from a frame",
    ]);
    expect(fs.readFileSync(path.join(dir, "slide_03.png"))).toEqual(TINY_PNG);
  });

  it("creates a missing output directory", async () => {
    const nested = path.join(tmp.dir, "a", "b", "c");
    await service(new FakeImageClient(), "abort", nested).generateImage("p", "x.png");
    expect(fs.existsSync(path.join(nested, "x.png"))).toBe(true);
  });

  it("abort policy rethrows the provider failure", async () => {
    const client = new FakeImageClient(new Set(["Honey dripping from a frame"]));
    await expect(service(client, "abort").generateForOutline(outline)).rejects.toThrow(
      UpstreamError
    );
  });

  it("abort policy names the failed file", async () => {
    const client = new FakeImageClient(new Set(["p"]));
    await expect(service(client, "abort").generateImage("p", "slide_07.png")).rejects.toThrow(
      "Image generation failed for slide_07.png: quota exceeded"
    );
  });

  it("placeholder policy keeps the prompt and reason", async () => {
    const client = new FakeImageClient(new Set(["Honey dripping from a frame"]));
    const images = await service(client, "placeholder").generateForOutline(outline);
    expect(images[3]).toEqual({
      kind: "placeholder",
      prompt: "Honey dripping from a frame",
      reason: "quota exceeded",
    });
    expect(images[2]!.kind).toBe("file");
  });

  it("omit policy leaves the slide without an image", async () => {
    const client = new FakeImageClient(new Set(["Beekeeping tools laid out on a table"]));
    const images = await service(client, "omit").generateForOutline(outline);
    expect(images[2]).toEqual({ kind: "none" });
    expect(images[3]!.kind).toBe("file");
    expect(
      fs.existsSync(path.join(tmp.dir, "out", "images", "slide_03.png"))
    ).toBe(false);
  });

  it("fails a write error as OutputError regardless of policy", async () => {
    const blocker = path.join(tmp.dir, "not-a-dir");
    fs.writeFileSync(blocker, "x");

    for (const policy of ["placeholder", "omit"] as const) {
      const client = new FakeImageClient();
      await expect(
        service(client, policy, blocker).generateImage("p", "slide_01.png")
      ).rejects.toBeInstanceOf(OutputError);
      expect(client.prompts).toEqual(["p"]);
    }
  });

  it("reports progress through the log callback", async () => {
    const lines: string[] = [];
    const outputDir = path.join(tmp.dir, "imgs");
    const svc = new ImageService({
      outputDir,
      provider: new OpenAIImageProvider(new FakeImageClient(new Set(["bad"]))),
      policy: "omit",
      log: (line) => lines.push(line),
    });
    await svc.generateImage("good", "slide_01.png");
    await svc.generateImage("bad", "slide_02.png");
    expect(lines).toEqual([
      `Image saved: ${path.join(outputDir, "slide_01.png")}`,
      "Image failed for slide_02.png, omitting: quota exceeded",
    ]);
  });
});
