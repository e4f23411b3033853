/**
 * Resolve FFmpeg executable path
 *
 * Priority:
 * 1. FFMPEG_PATH environment variable
 * 2. System FFmpeg (fallback)
 *
 * This function is used consistently across all FFmpeg-related code.
 */
export function resolveFfmpegPath(): string {
  if (process.env.FFMPEG_PATH) {
    return process.env.FFMPEG_PATH;
  }
  return "ffmpeg";
}

/**
 * Get information about the resolved FFmpeg path
 */
export function getFfmpegInfo(): {
  path: string;
  source: "env" | "system";
} {
  return {
    path: resolveFfmpegPath(),
    source: process.env.FFMPEG_PATH ? "env" : "system",
  };
}

/**
 * Build FFmpeg arguments that rewrap a raw H.264 elementary stream into MP4
 * without re-encoding
 */
export function buildRemuxArgs(inputPath: string, outputPath: string): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    inputPath,
    "-c:v",
    "copy",
    outputPath,
    "-y",
  ];
}
