import { createLogger } from "../log";

const log = createLogger("pubsub");

export type PubSubMessage = {
  topic: string;
  payload: Uint8Array;
  publishedAtMs: number;
};

export type Subscriber = {
  id: string;
  topicPattern: string;
  callback: (msg: PubSubMessage) => void;
};

/**
 * "*" matches everything, an exact name matches itself, and "a/*" or "a/**"
 * match every topic under "a/".
 */
export function topicMatches(pattern: string, topic: string): boolean {
  if (pattern === "*" || pattern === "**") return true;
  if (pattern === topic) return true;
  for (const suffix of ["/**", "/*"]) {
    if (pattern.endsWith(suffix)) {
      const prefix = pattern.slice(0, -suffix.length + 1); // keep the "/"
      return topic.startsWith(prefix);
    }
  }
  return false;
}

export class PubSubBroker {
  private subscribers = new Map<string, Subscriber>();

  constructor(private deps: { nowMs: () => number } = { nowMs: () => Date.now() }) {}

  subscribe(sub: Subscriber): () => void {
    this.subscribers.set(sub.id, sub);
    return () => {
      this.subscribers.delete(sub.id);
    };
  }

  publish(topic: string, payload: Uint8Array, publishedAtMs = this.deps.nowMs()): void {
    const msg: PubSubMessage = { topic, payload, publishedAtMs };

    for (const sub of this.subscribers.values()) {
      if (topicMatches(sub.topicPattern, topic)) {
        try {
          sub.callback(msg);
        } catch (e) {
          log.error(`subscriber ${sub.id} error:`, e);
        }
      }
    }
  }
}
