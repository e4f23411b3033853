import type { FastifyBaseLogger, FastifyReply } from "fastify";
import type { ApiErrorResponseT } from "@camhub/protocol";
import { CameraErrorCode, toCameraError } from "../camera/camera-errors.js";

/**
 * Map any thrown value onto the shared error body and HTTP status
 *
 * Caller errors log at warn, system errors at error with the stack.
 */
export function sendCameraError(
  reply: FastifyReply,
  log: FastifyBaseLogger,
  tag: string,
  error: unknown
): FastifyReply {
  const cameraError = toCameraError(error, CameraErrorCode.UNKNOWN_ERROR);

  if (cameraError.kind === "caller") {
    log.warn(`[${tag}] Request rejected: ${cameraError.message}`);
  } else {
    log.error({ err: error }, `[${tag}] ${cameraError.message}`);
  }

  const body: ApiErrorResponseT = {
    success: false,
    error: cameraError.code,
    message: cameraError.message,
    ...(cameraError.details && { details: cameraError.details }),
  };
  return reply.code(cameraError.httpStatus).send(body);
}
