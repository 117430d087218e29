import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Read a JSON file and parse it */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/** Write an object as JSON to a file */
export async function writeJSON(
  filePath: string,
  data: unknown
): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n");
}

/** Write a string or buffer to a file, creating directories as needed. Overwrites. */
export async function writeFile(
  filePath: string,
  content: string | Uint8Array
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, content);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/** Image file name for a 1-based slide index: slide_01.png, slide_02.png, ... */
export function slideImageName(index: number): string {
  return `slide_${String(index).padStart(2, "0")}.png`;
}

/** Default images directory: `images/` beside the output file */
export function defaultImagesDir(outPath: string, dirname = "images"): string {
  return path.join(path.dirname(outPath), dirname);
}
