import { writeFile } from "node:fs/promises";
import type { Transcoder, TranscodeResultT } from "../camera/transcoder.js";

export const FAKE_MP4 = Buffer.from("fake-mp4-payload");

export type FakeTranscoderOptionsT = {
  output?: Buffer;
  writeOutput?: boolean;
  failWith?: { exitCode: number | null; detail: string };
  onTranscode?: (inputPath: string, outputPath: string) => void;
};

/**
 * Transcoder that writes a fixed payload instead of running ffmpeg
 */
export class FakeTranscoder implements Transcoder {
  readonly name = "fake";
  readonly calls: Array<{ inputPath: string; outputPath: string }> = [];
  private readonly options: FakeTranscoderOptionsT;

  constructor(options: FakeTranscoderOptionsT = {}) {
    this.options = options;
  }

  async transcode(
    inputPath: string,
    outputPath: string
  ): Promise<TranscodeResultT> {
    this.calls.push({ inputPath, outputPath });
    this.options.onTranscode?.(inputPath, outputPath);

    const failure = this.options.failWith;
    if (failure) {
      return { ok: false, ...failure, durationMs: 0 };
    }
    if (this.options.writeOutput ?? true) {
      await writeFile(outputPath, this.options.output ?? FAKE_MP4);
    }
    return { ok: true, durationMs: 0 };
  }
}
