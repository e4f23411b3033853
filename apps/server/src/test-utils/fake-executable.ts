import { chmod, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Write a Node script that stands in for an external binary such as
 * rpicam-vid or ffmpeg
 */
export async function writeFakeExecutable(
  dir: string,
  name: string,
  source: string
): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, `#!${process.execPath}\n${source}\n`);
  await chmod(filePath, 0o755);
  return filePath;
}
