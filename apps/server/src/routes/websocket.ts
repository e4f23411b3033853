import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { z } from "zod";
import type {
  WebSocketServerMessageT,
  WebSocketTopicT,
} from "@camhub/protocol";
import type { CameraService } from "../camera/camera-service.js";
import type { WebSocketManager } from "../services/websocket-manager.js";

const TopicSchema = z.enum(["camera", "streaming"]);

/**
 * Client message schema; unknown topics are dropped rather than rejected
 */
const ClientMessageSchema = z.object({
  type: z.enum(["subscribe", "unsubscribe"]),
  topics: z.array(z.string()),
});

function messageText(message: Buffer | ArrayBuffer | Buffer[]): string {
  if (Array.isArray(message)) {
    return Buffer.concat(message).toString();
  }
  if (message instanceof ArrayBuffer) {
    return Buffer.from(message).toString();
  }
  return message.toString();
}

function validTopics(topics: string[]): WebSocketTopicT[] {
  return topics.flatMap((topic) => {
    const parsed = TopicSchema.safeParse(topic);
    return parsed.success ? [parsed.data] : [];
  });
}

/**
 * Register WebSocket route
 *
 * Topic-based event push. Clients subscribe to topics (camera, streaming)
 * and receive only events for those topics.
 *
 * Protocol:
 * - Client → Server: { type: "subscribe", topics: ["camera", "streaming"] }
 * - Server → Client: { type: "camera.status", ... } (only if subscribed)
 */
export async function registerWebSocketRoute(
  fastify: FastifyInstance,
  options: FastifyPluginOptions & {
    camera: CameraService;
    websocketManager: WebSocketManager;
  }
): Promise<void> {
  const { camera, websocketManager } = options;

  const snapshotFor = (topic: WebSocketTopicT): WebSocketServerMessageT => {
    if (topic === "camera") {
      return { type: "camera.status", ...camera.getStatus() };
    }
    return { type: "streaming.status", ...camera.getStatus().streaming };
  };

  fastify.get("/ws", { websocket: true }, (socket, request) => {
    fastify.log.info(`[WebSocket] Client connected from ${request.ip}`);
    websocketManager.add(socket);

    socket.on("message", (message) => {
      let data: z.infer<typeof ClientMessageSchema>;
      try {
        data = ClientMessageSchema.parse(JSON.parse(messageText(message)));
      } catch (error: unknown) {
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        fastify.log.warn(`[WebSocket] Ignoring malformed message: ${errorMessage}`);
        return;
      }

      const topics = validTopics(data.topics);
      if (topics.length === 0) {
        return;
      }

      const added = websocketManager.update(socket, data.type, topics);
      fastify.log.info(
        `[WebSocket] Client ${data.type}d: ${topics.join(", ")} (now: ${
          websocketManager.topicsOf(socket).join(", ") || "none"
        })`
      );
      // new subscribers start from the current state
      for (const topic of added) {
        websocketManager.send(socket, snapshotFor(topic));
      }
    });

    socket.on("close", () => {
      fastify.log.info("[WebSocket] Client disconnected");
      websocketManager.remove(socket);
    });

    socket.on("error", (error: Error) => {
      fastify.log.error({ err: error }, "[WebSocket] Error");
      websocketManager.remove(socket);
    });
  });
}
