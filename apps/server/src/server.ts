import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import {
  CameraService,
  type CameraServiceOptionsT,
} from "./camera/camera-service.js";
import type { Transcoder } from "./camera/transcoder.js";
import type { ServerConfigT } from "./config.js";
import type { CaptureDeviceFactory } from "./modules/capture-device.js";
import { createDeviceFactory } from "./modules/index.js";
import { registerConfigRoute } from "./routes/config.js";
import { registerDownloadsRoute } from "./routes/downloads.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerRecordingRoute } from "./routes/recording.js";
import { registerStreamRoute } from "./routes/stream.js";
import { registerWebSocketRoute } from "./routes/websocket.js";
import { FfmpegTranscoder } from "./services/ffmpeg-transcoder.js";
import { ensureDailyLogFile } from "./services/log-file.js";
import { WebSocketManager } from "./services/websocket-manager.js";

declare module "fastify" {
  interface FastifyInstance {
    camera: CameraService;
  }
}

/**
 * Collaborators that tests swap for in-process fakes
 */
export type ServerDepsT = {
  logger?: FastifyServerOptions["logger"];
  createDevice?: CaptureDeviceFactory;
  transcoder?: Transcoder;
  camera?: Partial<
    Omit<CameraServiceOptionsT, "createDevice" | "transcoder" | "logger" | "notifier">
  >;
};

/**
 * Pretty console output in development, JSON in production, and always a
 * copy in the daily log file
 */
export async function buildLoggerOptions(
  config: ServerConfigT
): Promise<FastifyServerOptions["logger"]> {
  const logPath = await ensureDailyLogFile(config.logDir);
  const production = process.env.NODE_ENV === "production";
  const level = production ? "info" : "debug";

  return {
    level,
    transport: {
      targets: [
        production
          ? { target: "pino/file", level, options: { destination: 1 } }
          : {
              target: "pino-pretty",
              level,
              options: {
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
        {
          target: "pino/file",
          level,
          options: { destination: logPath, append: true, mkdir: true },
        },
      ],
    },
  };
}

/**
 * Create and configure Fastify server instance
 */
export async function createServer(
  config: ServerConfigT,
  deps: ServerDepsT = {}
) {
  const server = Fastify({
    logger: deps.logger ?? (await buildLoggerOptions(config)),
  });

  // Register CORS plugin
  await server.register(cors, {
    origin: true,
  });
  server.log.info("[Server] CORS plugin registered");

  // Register WebSocket plugin
  await server.register(websocket);
  server.log.info("[Server] WebSocket plugin registered");

  const websocketManager = new WebSocketManager();
  const camera = new CameraService({
    ...deps.camera,
    createDevice:
      deps.createDevice ?? createDeviceFactory(config.device, server.log),
    transcoder: deps.transcoder ?? new FfmpegTranscoder(server.log),
    logger: server.log,
    videoDir: deps.camera?.videoDir ?? config.videoDir,
    notifier: websocketManager,
  });
  server.decorate("camera", camera);
  server.log.info(
    `[Server] Camera service ready (driver: ${config.device}, videos: ${config.videoDir})`
  );

  // Streams keep connections open; end them before Fastify waits on them
  server.addHook("preClose", async () => {
    await camera.shutdown();
  });

  // Register routes
  await server.register(registerHealthRoute, {
    config,
    camera,
    websocketManager,
  });
  await server.register(registerRecordingRoute, { camera });
  await server.register(registerConfigRoute, { camera });
  await server.register(registerDownloadsRoute, { camera });
  await server.register(registerStreamRoute, { camera });
  await server.register(registerWebSocketRoute, { camera, websocketManager });
  server.log.info("[Server] All routes registered");

  return server;
}

function errorCode(error: unknown): string | undefined {
  if (
    error &&
    typeof error === "object" &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Start the server and handle graceful shutdown
 */
export async function startServer(
  server: Awaited<ReturnType<typeof createServer>>,
  config: ServerConfigT
): Promise<void> {
  try {
    await server.listen({ host: config.host, port: config.port });
    server.log.info(
      `Camera server listening on http://${config.host}:${config.port}`
    );
  } catch (err: unknown) {
    if (errorCode(err) === "EADDRINUSE") {
      server.log.error(
        `Port ${config.port} is already in use. Please choose a different port.`
      );
    } else {
      server.log.error({ err }, "Failed to start server");
    }
    process.exit(1);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    server.log.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.close();
      server.log.info("Server closed");
      process.exit(0);
    } catch (err) {
      server.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
