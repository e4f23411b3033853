import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFakeExecutable } from "../test-utils/fake-executable.js";
import { createTempDir, silentLogger } from "../test-utils/test-env.js";
import { testFfmpegAvailability } from "./ffmpeg-self-test.js";
import { FfmpegTranscoder } from "./ffmpeg-transcoder.js";

// copies the -i input to the output path, which precedes the trailing -y
const COPYING_FFMPEG = `
const fs = require("node:fs");
const args = process.argv.slice(2);
const input = args[args.indexOf("-i") + 1];
const output = args[args.length - 2];
fs.copyFileSync(input, output);
`;

describe("FfmpegTranscoder", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    inputPath = path.join(dir, "camera_video.h264");
    outputPath = path.join(dir, "camera_video.mp4");
    await writeFile(inputPath, "raw-h264");
  });

  afterEach(async () => {
    delete process.env.FFMPEG_PATH;
    await cleanup();
  });

  it("reports success when ffmpeg exits with 0", async () => {
    const ffmpeg = await writeFakeExecutable(dir, "ffmpeg", COPYING_FFMPEG);
    const transcoder = new FfmpegTranscoder(silentLogger, ffmpeg);

    const result = await transcoder.transcode(inputPath, outputPath);

    expect(result.ok).toBe(true);
    expect(await readFile(outputPath, "utf-8")).toBe("raw-h264");
  });

  it("returns the exit code and stderr when ffmpeg fails", async () => {
    const ffmpeg = await writeFakeExecutable(
      dir,
      "ffmpeg",
      `process.stderr.write("moov atom not found\\n"); process.exit(1);`
    );
    const transcoder = new FfmpegTranscoder(silentLogger, ffmpeg);

    const result = await transcoder.transcode(inputPath, outputPath);

    expect(result).toMatchObject({
      ok: false,
      exitCode: 1,
      detail: "moov atom not found",
    });
  });

  it("explains a missing ffmpeg binary", async () => {
    const missing = path.join(dir, "no-ffmpeg-here");
    const transcoder = new FfmpegTranscoder(silentLogger, missing);

    const result = await transcoder.transcode(inputPath, outputPath);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.exitCode).toBeNull();
      expect(
        result.detail.startsWith(
          `Failed to execute FFmpeg: spawn ${missing} ENOENT.`
        )
      ).toBe(true);
    }
  });

  it("reads the version line during the startup self-test", async () => {
    const ffmpeg = await writeFakeExecutable(
      dir,
      "ffmpeg",
      `process.stdout.write("ffmpeg version 6.1-camhub\\nbuilt with gcc\\n");`
    );
    process.env.FFMPEG_PATH = ffmpeg;

    await expect(testFfmpegAvailability()).resolves.toEqual({
      available: true,
      ffmpegPath: ffmpeg,
      version: "ffmpeg version 6.1-camhub",
    });
  });
});
