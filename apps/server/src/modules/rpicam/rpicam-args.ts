import type { CaptureProfileT } from "../capture-device.js";

/**
 * Capture binaries in preference order; older Raspberry Pi OS images only
 * ship the libcamera-prefixed name.
 */
export const RPICAM_BINARIES = ["rpicam-vid", "libcamera-vid"] as const;

const RPICAM_PATH_ENV = "RPICAM_PATH";

/**
 * Resolve candidate binaries, honouring an explicit RPICAM_PATH override
 */
export function resolveRpicamCandidates(): string[] {
  const envPath = process.env[RPICAM_PATH_ENV];
  if (envPath) {
    return [envPath];
  }
  return [...RPICAM_BINARIES];
}

function baseArgs(profile: CaptureProfileT): string[] {
  return [
    "-t",
    "0",
    "--width",
    String(profile.width),
    "--height",
    String(profile.height),
    "--framerate",
    String(profile.fps),
    "--rotation",
    String(profile.rotation),
    "-n",
  ];
}

/**
 * Raw H.264 elementary stream into a file, with inline headers so the file
 * can be remuxed without the encoder's side data
 */
export function buildRecordingArgs(
  profile: CaptureProfileT,
  outputPath: string
): string[] {
  return [...baseArgs(profile), "--codec", "h264", "--inline", "-o", outputPath];
}

/**
 * Concatenated JPEG frames on stdout
 */
export function buildMjpegArgs(profile: CaptureProfileT): string[] {
  const quality = profile.kind === "mjpeg" ? profile.quality : 85;
  return [
    ...baseArgs(profile),
    "--codec",
    "mjpeg",
    "--quality",
    String(quality),
    "-o",
    "-",
  ];
}
