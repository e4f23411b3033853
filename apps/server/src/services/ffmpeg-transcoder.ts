import { spawn } from "node:child_process";
import type { Transcoder, TranscodeResultT } from "../camera/transcoder.js";
import { buildRemuxArgs, resolveFfmpegPath } from "../utils/ffmpeg-path.js";
import type { LoggerLikeT } from "./logger.js";

const MAX_STDERR_BYTES = 16 * 1024;

/**
 * Transcoder backed by an FFmpeg subprocess
 */
export class FfmpegTranscoder implements Transcoder {
  readonly name = "ffmpeg";
  private readonly logger: LoggerLikeT;
  private readonly ffmpegPath: string;

  constructor(logger: LoggerLikeT, ffmpegPath: string = resolveFfmpegPath()) {
    this.logger = logger;
    this.ffmpegPath = ffmpegPath;
  }

  transcode(inputPath: string, outputPath: string): Promise<TranscodeResultT> {
    const args = buildRemuxArgs(inputPath, outputPath);
    const startedAt = Date.now();
    this.logger.info(`[FFmpeg] ${this.ffmpegPath} ${args.join(" ")}`);

    return new Promise((resolve) => {
      const ffmpegProcess = spawn(this.ffmpegPath, args, {
        stdio: ["ignore", "ignore", "pipe"],
      });

      let stderr = "";
      ffmpegProcess.stderr.on("data", (data: Buffer) => {
        if (stderr.length < MAX_STDERR_BYTES) {
          stderr += data.toString();
        }
      });

      ffmpegProcess.on("close", (code) => {
        const durationMs = Date.now() - startedAt;
        if (code === 0) {
          resolve({ ok: true, durationMs });
          return;
        }
        resolve({
          ok: false,
          exitCode: code,
          detail: stderr.trim() || `FFmpeg exited with code ${code}`,
          durationMs,
        });
      });

      ffmpegProcess.on("error", (error) => {
        resolve({
          ok: false,
          exitCode: null,
          detail:
            `Failed to execute FFmpeg: ${error.message}. ` +
            `FFmpeg path: "${this.ffmpegPath}". ` +
            `Make sure FFmpeg is installed and accessible.`,
          durationMs: Date.now() - startedAt,
        });
      });
    });
  }
}
