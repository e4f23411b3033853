import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import type { FastifyInstance, FastifyPluginOptions, FastifyReply } from "fastify";
import type { CameraService } from "../camera/camera-service.js";
import { sendCameraError } from "./route-errors.js";

async function sendFile(
  reply: FastifyReply,
  filePath: string,
  contentType: string
): Promise<FastifyReply> {
  const info = await stat(filePath);
  return reply
    .header("Content-Type", contentType)
    .header("Content-Length", info.size)
    .header(
      "Content-Disposition",
      `attachment; filename="${path.basename(filePath)}"`
    )
    .send(createReadStream(filePath));
}

/**
 * Register download routes
 *
 * GET /download - Finished MP4
 * GET /download/raw - Raw H.264 capture, available once recording stopped
 */
export async function registerDownloadsRoute(
  fastify: FastifyInstance,
  options: FastifyPluginOptions & { camera: CameraService }
): Promise<void> {
  const { camera } = options;

  fastify.get("/download", async (request, reply) => {
    fastify.log.info(`[Download] Request received from ${request.ip}`);
    try {
      const filePath = await camera.resolveFinalDownload();
      return await sendFile(reply, filePath, "video/mp4");
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Download", error);
    }
  });

  fastify.get("/download/raw", async (request, reply) => {
    fastify.log.info(`[Download] Raw request received from ${request.ip}`);
    try {
      const filePath = await camera.resolveRawDownload();
      return await sendFile(reply, filePath, "video/h264");
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Download", error);
    }
  });
}
