import express from "express";
import type {
  HealthResponse,
  PublishResponse,
  StatsResponse,
  TopicListResponse,
} from "@topicwatch/common";
import { PublishRequestSchema, decodePayload } from "@topicwatch/common";
import type { ServerEnv } from "../env";
import { errorMessage } from "../errors";
import type { PubSubBroker } from "../pubsub";
import type { DeltaStream } from "../sse/stream";
import { decoderName, type DecoderCapability } from "../topics/decoder";
import type { SnapshotDiffer } from "../topics/differ";
import type { IngestAdapter } from "../topics/ingest";
import type { TopicStore } from "../topics/store";

export function makeRoutes(
  env: Pick<ServerEnv, "reloadPeriodMs">,
  store: TopicStore,
  broker: PubSubBroker,
  stream: DeltaStream,
  ingest: IngestAdapter,
  differ: SnapshotDiffer,
  decoder: DecoderCapability
) {
  const router = express.Router();

  router.get("/health", (_req, res) => {
    const body: HealthResponse = { ok: true, decoder: decoderName(decoder), reloadPeriodMs: env.reloadPeriodMs };
    return res.json(body);
  });

  // ── Topic cache ──

  router.get("/topics", (_req, res) => {
    const body: TopicListResponse = { topics: store.list() };
    return res.json(body);
  });

  router.get("/stats", (_req, res) => {
    const body: StatsResponse = {
      topics: store.size,
      viewers: stream.viewerCount,
      ingest: ingest.getStats(),
      ...differ.getStats(),
    };
    return res.json(body);
  });

  router.post("/publish", (req, res) => {
    const parsed = PublishRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "bad_body", issues: parsed.error.issues });

    let payload: Uint8Array;
    try {
      payload = decodePayload(parsed.data.payload, parsed.data.encoding);
    } catch (e) {
      return res.status(400).json({ error: "bad_body", detail: errorMessage(e) });
    }

    broker.publish(parsed.data.topic, payload, parsed.data.timestampMs);
    const body: PublishResponse = { ok: true, topic: parsed.data.topic, size_bytes: payload.byteLength };
    return res.json(body);
  });

  // ── Delta stream ──

  router.get("/sse", (_req, res) => {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    res.flushHeaders();
    stream.connect(res);
  });

  return router;
}
