import type { BaseLogger } from "pino";

/**
 * Logger surface the camera services write to.
 * Fastify's request-independent `server.log` satisfies it.
 */
export type LoggerLikeT = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;
