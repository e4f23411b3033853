import { stat } from "node:fs/promises";
import type { Clock } from "../services/clock.js";

export const STABILITY_POLL_INTERVAL_MS = 500;
export const STABILITY_MAX_CHECKS = 20;
export const STABILITY_REQUIRED_MATCHES = 3;

export type FileSizeReader = (filePath: string) => Promise<number | null>;

export type StabilityResultT = {
  stable: boolean;
  size: number | null;
  checks: number;
};

export type StabilityOptionsT = {
  clock: Clock;
  readSize?: FileSizeReader;
  intervalMs?: number;
  maxChecks?: number;
  requiredMatches?: number;
};

/**
 * Read a file's size, or null when it does not exist
 */
export const readFileSize: FileSizeReader = async (filePath) => {
  try {
    const info = await stat(filePath);
    return info.size;
  } catch (error) {
    if (
      error &&
      typeof error === "object" &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      return null;
    }
    throw error;
  }
};

/**
 * Poll a file's size until it is unchanged across `requiredMatches`
 * consecutive samples. The sample that first shows a size counts as the
 * first match. Running out of checks is not an error: the caller proceeds
 * with `stable: false`.
 */
export async function waitForFileStability(
  filePath: string,
  options: StabilityOptionsT
): Promise<StabilityResultT> {
  const readSize = options.readSize ?? readFileSize;
  const intervalMs = options.intervalMs ?? STABILITY_POLL_INTERVAL_MS;
  const maxChecks = options.maxChecks ?? STABILITY_MAX_CHECKS;
  const requiredMatches = options.requiredMatches ?? STABILITY_REQUIRED_MATCHES;

  let lastSize: number | null = null;
  let matches = 0;
  let checks = 0;

  while (checks < maxChecks) {
    const size = await readSize(filePath);
    checks++;

    if (size !== null && size === lastSize) {
      matches++;
    } else {
      lastSize = size;
      matches = 1;
    }

    if (size !== null && matches >= requiredMatches) {
      return { stable: true, size, checks };
    }

    await options.clock.sleep(intervalMs);
  }

  return { stable: false, size: lastSize, checks };
}
