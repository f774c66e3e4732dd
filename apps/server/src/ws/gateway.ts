import type { IncomingMessage, Server as HttpServer } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { PublishRequestSchema, decodePayload } from "@topicwatch/common";
import { TransportError, errorMessage } from "../errors";
import { createLogger } from "../log";
import type { PubSubBroker } from "../pubsub";

const log = createLogger("ws");

export type GatewayReply = { error: "bad_frame"; detail: string };

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data);
}

/**
 * WebSocket ingest. Text frames carry a JSON PublishRequest; binary frames
 * are raw payloads for the topic named by the connection's `?topic=`.
 */
export class IngestGateway {
  private wss: WebSocketServer;

  constructor(
    server: HttpServer,
    private broker: PubSubBroker,
    opts: { path: string; nowMs?: () => number }
  ) {
    const nowMs = opts.nowMs ?? (() => Date.now());
    this.wss = new WebSocketServer({ server, path: opts.path });
    this.wss.on("connection", (socket, req) => {
      const boundTopic = topicFromUrl(req);
      log.info(`publisher connected${boundTopic ? ` (topic ${boundTopic})` : ""}`);

      socket.on("message", (data, isBinary) => {
        try {
          this.handleFrame(data, isBinary, boundTopic, nowMs());
        } catch (e) {
          log.error(`dropped frame: ${errorMessage(e)}`);
          reply(socket, { error: "bad_frame", detail: errorMessage(e) });
        }
      });
      socket.on("error", (e) => log.error("publisher socket error:", e));
      socket.on("close", () => log.info("publisher disconnected"));
    });
  }

  close(): Promise<void> {
    for (const client of this.wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleFrame(data: RawData, isBinary: boolean, boundTopic: string | undefined, now: number) {
    if (isBinary) {
      if (!boundTopic) throw new TransportError("binary frame on a connection without ?topic=");
      this.broker.publish(boundTopic, toBytes(data), now);
      return;
    }

    let body: unknown;
    try {
      body = JSON.parse(Buffer.from(toBytes(data)).toString("utf8"));
    } catch {
      throw new TransportError("text frame is not JSON");
    }
    const parsed = PublishRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }

    let payload: Uint8Array;
    try {
      payload = decodePayload(parsed.data.payload, parsed.data.encoding);
    } catch (e) {
      throw new TransportError(errorMessage(e), { cause: e });
    }
    this.broker.publish(parsed.data.topic, payload, parsed.data.timestampMs ?? now);
  }
}

function topicFromUrl(req: IncomingMessage): string | undefined {
  const url = new URL(req.url ?? "/", "http://localhost");
  return url.searchParams.get("topic") || undefined;
}

function reply(socket: WebSocket, msg: GatewayReply) {
  if (socket.readyState === socket.OPEN) socket.send(JSON.stringify(msg));
}
