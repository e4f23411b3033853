import { spawn } from "node:child_process";
import fs from "node:fs";
import { getFfmpegInfo, resolveFfmpegPath } from "../utils/ffmpeg-path.js";
import type { LoggerLikeT } from "./logger.js";

const SELF_TEST_TIMEOUT_MS = 5000;

/**
 * Test whether FFmpeg can be executed
 *
 * @returns Object with test results
 */
export async function testFfmpegAvailability(): Promise<{
  available: boolean;
  ffmpegPath: string;
  version?: string;
  error?: string;
}> {
  const ffmpegPath = resolveFfmpegPath();

  return new Promise((resolve) => {
    if (ffmpegPath !== "ffmpeg" && !fs.existsSync(ffmpegPath)) {
      resolve({
        available: false,
        ffmpegPath,
        error: `FFmpeg not found at: ${ffmpegPath}`,
      });
      return;
    }

    const ffmpegProcess = spawn(ffmpegPath, ["-hide_banner", "-version"]);

    let stdout = "";
    const timeout = setTimeout(() => {
      ffmpegProcess.kill("SIGTERM");
      resolve({
        available: false,
        ffmpegPath,
        error: "FFmpeg version check timed out",
      });
    }, SELF_TEST_TIMEOUT_MS);

    ffmpegProcess.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    ffmpegProcess.on("close", (code) => {
      clearTimeout(timeout);
      if (code !== 0) {
        resolve({
          available: false,
          ffmpegPath,
          error: `FFmpeg exited with code ${code}`,
        });
        return;
      }
      resolve({
        available: true,
        ffmpegPath,
        version: stdout.split("\n")[0]?.trim(),
      });
    });

    ffmpegProcess.on("error", (error) => {
      clearTimeout(timeout);
      resolve({
        available: false,
        ffmpegPath,
        error:
          `Failed to execute FFmpeg: ${error.message}. ` +
          `Make sure FFmpeg is installed and accessible.`,
      });
    });
  });
}

/**
 * Log FFmpeg availability at startup. Recordings still run without FFmpeg,
 * but finalization will fail and only the raw file will be downloadable.
 */
export async function logFfmpegStatus(logger: LoggerLikeT): Promise<void> {
  const ffmpegInfo = getFfmpegInfo();
  const testResult = await testFfmpegAvailability();

  logger.info(
    `[FFmpeg] Source: ${
      ffmpegInfo.source === "env"
        ? "Environment variable (FFMPEG_PATH)"
        : "System FFmpeg"
    }`
  );
  logger.info(`[FFmpeg] Path: ${testResult.ffmpegPath}`);

  if (testResult.available) {
    logger.info(`[FFmpeg] ${testResult.version ?? "version unknown"}`);
    return;
  }

  logger.error(`[FFmpeg] NOT AVAILABLE: ${testResult.error ?? "unknown error"}`);
  logger.warn(
    `[FFmpeg] Recordings will stay in raw H.264 form. ` +
      `Install FFmpeg or set FFMPEG_PATH to enable MP4 conversion.`
  );
}
