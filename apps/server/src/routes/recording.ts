import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import type { CameraService } from "../camera/camera-service.js";
import { sendCameraError } from "./route-errors.js";

/**
 * Register recording routes
 *
 * POST /start - Start recording with the current configuration
 * POST /stop - Request the running recording to stop
 * GET /status - Recording, converting and streaming state
 */
export async function registerRecordingRoute(
  fastify: FastifyInstance,
  options: FastifyPluginOptions & { camera: CameraService }
): Promise<void> {
  const { camera } = options;

  fastify.post("/start", async (request, reply) => {
    fastify.log.info(`[Recording] Start requested from ${request.ip}`);
    try {
      return await camera.startRecording();
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Recording", error);
    }
  });

  /**
   * POST /stop
   * Returns as soon as the stop is signalled; finalization continues in
   * the background and shows up as "converting" in /status.
   */
  fastify.post("/stop", async (request, reply) => {
    fastify.log.info(`[Recording] Stop requested from ${request.ip}`);
    try {
      return camera.requestStopRecording();
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Recording", error);
    }
  });

  fastify.get("/status", async () => {
    return camera.getStatus();
  });
}
