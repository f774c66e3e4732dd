import crypto from "node:crypto";
import { formatSseFrame, type Delta } from "@topicwatch/common";
import type { SessionError } from "../errors";
import { createLogger } from "../log";
import type { TopicStore } from "../topics/store";
import { ViewerSession, type SseSink } from "./session";

const log = createLogger("sse");

export function serializeDelta(delta: Delta): string {
  return formatSseFrame("message", JSON.stringify({ updated: delta.updated, removed: delta.removed }));
}

/**
 * Fans deltas out to every connected viewer. Each delta is serialized once;
 * empty deltas are sent too and double as a keep-alive on every tick.
 */
export class DeltaStream {
  private sessions = new Map<string, ViewerSession>();

  constructor(
    private store: TopicStore,
    private opts: { bufferLimit: number }
  ) {}

  get viewerCount() {
    return this.sessions.size;
  }

  /** Registers a viewer and sends it every current topic as its first delta. */
  connect(sink: SseSink): ViewerSession {
    const session = new ViewerSession(crypto.randomUUID(), sink, {
      bufferLimit: this.opts.bufferLimit,
      onClose: (s, reason) => this.drop(s, reason),
    });
    this.sessions.set(session.id, session);
    log.info(`viewer ${session.id} connected (${this.sessions.size} total)`);

    session.send(serializeDelta({ updated: this.store.list(), removed: [] }));
    return session;
  }

  publish(delta: Delta) {
    if (this.sessions.size === 0) return;
    const frame = serializeDelta(delta);
    for (const session of this.sessions.values()) session.send(frame);
  }

  closeAll() {
    for (const session of Array.from(this.sessions.values())) session.close();
  }

  private drop(session: ViewerSession, reason?: SessionError) {
    if (!this.sessions.delete(session.id)) return;
    if (reason) log.warn(`viewer ${reason.sessionId} dropped: ${reason.message}`);
    else log.info(`viewer ${session.id} disconnected`);
  }
}
