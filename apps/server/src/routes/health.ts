import path from "node:path";
import { fileURLToPath } from "node:url";
import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import type { HealthResponseT } from "@camhub/protocol";
import type { CameraService } from "../camera/camera-service.js";
import type { ServerConfigT } from "../config.js";
import { readPackageVersion } from "../services/package-version.js";
import type { WebSocketManager } from "../services/websocket-manager.js";

const UNKNOWN_VERSION = "0.0.0";

/**
 * Register health route
 *
 * GET /health - Liveness plus the camera mode and connected event clients
 */
export async function registerHealthRoute(
  fastify: FastifyInstance,
  options: FastifyPluginOptions & {
    config: ServerConfigT;
    camera: CameraService;
    websocketManager: WebSocketManager;
  }
): Promise<void> {
  const { config, camera, websocketManager } = options;
  const version =
    readPackageVersion(path.dirname(fileURLToPath(import.meta.url))) ??
    UNKNOWN_VERSION;

  fastify.get("/health", async (): Promise<HealthResponseT> => {
    return {
      running: true,
      version,
      uptime: Math.floor(process.uptime()),
      host: config.host,
      port: config.port,
      device: config.device,
      mode: camera.getStatus().mode,
      websocketClients: websocketManager.clientCount(),
    };
  });
}
