import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import type { CameraService } from "../camera/camera-service.js";
import { sendCameraError } from "./route-errors.js";

/**
 * Register config routes
 *
 * GET /getconfig - Current recording configuration
 * POST /setconfig - Partial update, only while the camera is idle
 */
export async function registerConfigRoute(
  fastify: FastifyInstance,
  options: FastifyPluginOptions & { camera: CameraService }
): Promise<void> {
  const { camera } = options;

  fastify.get("/getconfig", async () => {
    return camera.getConfig();
  });

  fastify.post("/setconfig", async (request, reply) => {
    try {
      return camera.setConfig(request.body ?? {});
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Config", error);
    }
  });
}
