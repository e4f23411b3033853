import { Readable } from "node:stream";
import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { createUnavailableError } from "../camera/camera-errors.js";
import type { CameraService } from "../camera/camera-service.js";
import { MULTIPART_CONTENT_TYPE } from "../camera/multipart.js";
import { sendCameraError } from "./route-errors.js";

async function* prepend(
  first: Buffer,
  rest: AsyncGenerator<Buffer, void, undefined>
): AsyncGenerator<Buffer, void, undefined> {
  yield first;
  yield* rest;
}

/**
 * Register streaming routes
 *
 * GET /stream - Live MJPEG (multipart/x-mixed-replace)
 * POST /stream/stop - Stop the stream for every viewer
 * GET /test - Single still JPEG
 */
export async function registerStreamRoute(
  fastify: FastifyInstance,
  options: FastifyPluginOptions & { camera: CameraService }
): Promise<void> {
  const { camera } = options;

  /**
   * GET /stream
   * The first frame is pulled before headers go out so that a busy or
   * unavailable camera still answers with a JSON error.
   */
  fastify.get("/stream", async (request, reply) => {
    fastify.log.info(`[Stream] Viewer connected from ${request.ip}`);
    const abort = new AbortController();
    const frames = camera.subscribe(abort.signal);

    let first: IteratorResult<Buffer, void>;
    try {
      first = await frames.next();
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Stream", error);
    }
    if (first.done) {
      return sendCameraError(
        reply,
        fastify.log,
        "Stream",
        createUnavailableError("stream ended before the first frame")
      );
    }

    reply.raw.on("close", () => {
      fastify.log.info(`[Stream] Viewer disconnected from ${request.ip}`);
      abort.abort();
    });

    return reply
      .header("Content-Type", MULTIPART_CONTENT_TYPE)
      .header("Cache-Control", "no-cache, no-store, must-revalidate")
      .header("Pragma", "no-cache")
      .header("Connection", "close")
      .send(Readable.from(prepend(first.value, frames)));
  });

  fastify.post("/stream/stop", async (_request, reply) => {
    try {
      return await camera.forceStopStreaming();
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Stream", error);
    }
  });

  fastify.get("/test", async (request, reply) => {
    fastify.log.info(`[Still] Capture requested from ${request.ip}`);
    try {
      const still = await camera.captureStill();
      return reply
        .header("Content-Type", "image/jpeg")
        .header("Content-Disposition", 'attachment; filename="still.jpg"')
        .send(still.bytes);
    } catch (error: unknown) {
      return sendCameraError(reply, fastify.log, "Still", error);
    }
  });
}
