import type {
  WebSocketServerMessageT,
  WebSocketTopicT,
} from "@camhub/protocol";

/**
 * Anything that can take a serialized message; a ws socket in production
 */
export type WebSocketClient = {
  send: (data: string) => void;
};

/**
 * Status fan-out to WebSocket clients
 *
 * Every connected client carries the set of topics it asked for. Camera
 * state changes go to `camera`, stream viewer changes to `streaming`. A
 * client whose send throws is treated as gone.
 */
export class WebSocketManager {
  private readonly topicsByClient = new Map<
    WebSocketClient,
    Set<WebSocketTopicT>
  >();

  add(client: WebSocketClient): void {
    this.topicsByClient.set(client, new Set());
  }

  remove(client: WebSocketClient): void {
    this.topicsByClient.delete(client);
  }

  /**
   * Apply a subscribe or unsubscribe request
   *
   * @returns the topics newly added by a subscribe, for which the caller
   * sends a snapshot; empty for unsubscribe or an unknown client
   */
  update(
    client: WebSocketClient,
    action: "subscribe" | "unsubscribe",
    topics: WebSocketTopicT[]
  ): WebSocketTopicT[] {
    const current = this.topicsByClient.get(client);
    if (!current) {
      return [];
    }
    if (action === "unsubscribe") {
      topics.forEach((topic) => current.delete(topic));
      return [];
    }
    const added = topics.filter((topic) => !current.has(topic));
    added.forEach((topic) => current.add(topic));
    return added;
  }

  topicsOf(client: WebSocketClient): WebSocketTopicT[] {
    return [...(this.topicsByClient.get(client) ?? [])];
  }

  /**
   * Send to every client on the topic; returns how many received it
   */
  broadcast(topic: WebSocketTopicT, message: WebSocketServerMessageT): number {
    const payload = JSON.stringify(message);
    let delivered = 0;
    for (const [client, topics] of this.topicsByClient) {
      if (topics.has(topic) && this.deliver(client, payload)) {
        delivered++;
      }
    }
    return delivered;
  }

  send(client: WebSocketClient, message: WebSocketServerMessageT): boolean {
    return this.deliver(client, JSON.stringify(message));
  }

  clientCount(): number {
    return this.topicsByClient.size;
  }

  private deliver(client: WebSocketClient, payload: string): boolean {
    try {
      client.send(payload);
      return true;
    } catch {
      this.topicsByClient.delete(client);
      return false;
    }
  }
}
