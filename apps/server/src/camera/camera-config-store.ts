import { z } from "zod";
import type {
  CameraConfigResponseT,
  CameraConfigT,
  SetConfigRequestT,
} from "@camhub/protocol";
import { createInvalidConfigError } from "./camera-errors.js";

export const VALID_RESOLUTIONS: ReadonlyArray<readonly [number, number]> = [
  [640, 480],
  [1280, 720],
  [1920, 1080],
];

export const VALID_FPS: readonly number[] = [25, 30];

export const DEFAULT_CAMERA_CONFIG: CameraConfigT = {
  width: 1280,
  height: 720,
  fps: 30,
};

/**
 * Partial update body for POST /setconfig
 */
export const SetConfigSchema = z
  .object({
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
    fps: z.number().int().positive().optional(),
  })
  .strict()
  .refine((body) => (body.width === undefined) === (body.height === undefined), {
    message: "width and height must be provided together",
  });

function formatResolutions(): string {
  return VALID_RESOLUTIONS.map(([w, h]) => `${w}x${h}`).join(", ");
}

export function toConfigResponse(config: CameraConfigT): CameraConfigResponseT {
  return {
    format: "mp4",
    width: config.width,
    height: config.height,
    resolution: `${config.width}x${config.height}`,
    fps: config.fps,
  };
}

/**
 * Holds the recording configuration applied to the next start
 */
export class CameraConfigStore {
  private config: CameraConfigT;

  constructor(initial: CameraConfigT = DEFAULT_CAMERA_CONFIG) {
    this.config = { ...initial };
  }

  get(): CameraConfigT {
    return { ...this.config };
  }

  /**
   * Validate and merge a partial update
   *
   * @throws CameraError INVALID_CONFIG
   */
  update(body: unknown): CameraConfigT {
    const parsed = SetConfigSchema.safeParse(body);
    if (!parsed.success) {
      throw createInvalidConfigError(
        parsed.error.issues[0]?.message ?? "Invalid configuration",
        { issues: parsed.error.issues.map((issue) => issue.message) }
      );
    }
    const request: SetConfigRequestT = parsed.data;
    const next: CameraConfigT = { ...this.config };

    if (request.width !== undefined && request.height !== undefined) {
      const { width, height } = request;
      const supported = VALID_RESOLUTIONS.some(
        ([w, h]) => w === width && h === height
      );
      if (!supported) {
        throw createInvalidConfigError(
          `Unsupported resolution ${width}x${height}. Valid: ${formatResolutions()}`,
          { width, height }
        );
      }
      next.width = width;
      next.height = height;
    }

    if (request.fps !== undefined) {
      if (!VALID_FPS.includes(request.fps)) {
        throw createInvalidConfigError(
          `Unsupported fps ${request.fps}. Valid: ${VALID_FPS.join(", ")}`,
          { fps: request.fps }
        );
      }
      next.fps = request.fps;
    }

    this.config = next;
    return this.get();
  }
}
