import http from "node:http";
import express from "express";
import cors from "cors";
import type { ServerEnv } from "./env";
import { makeRoutes } from "./http/routes";
import { createLogger } from "./log";
import { PubSubBroker } from "./pubsub";
import { DeltaStream } from "./sse/stream";
import { decoderFromEnv, decoderName, type DecoderCapability } from "./topics/decoder";
import { SnapshotDiffer } from "./topics/differ";
import { IngestAdapter } from "./topics/ingest";
import { TopicStore } from "./topics/store";
import { IngestGateway } from "./ws/gateway";

const log = createLogger("server");

export type Topicwatch = {
  app: express.Express;
  server: http.Server;
  store: TopicStore;
  broker: PubSubBroker;
  differ: SnapshotDiffer;
  stream: DeltaStream;
  listen(): Promise<{ host: string; port: number }>;
  close(): Promise<void>;
};

/** Wires ingest -> store -> differ -> stream behind one HTTP server. Nothing runs until listen(). */
export function createTopicwatch(env: ServerEnv, decoder: DecoderCapability = decoderFromEnv(env.decoder, env.decoderRulesPath)): Topicwatch {
  const store = new TopicStore();
  const ingest = new IngestAdapter(store, decoder);
  const broker = new PubSubBroker();
  const differ = new SnapshotDiffer(store, env.reloadPeriodMs, { nowMs: () => Date.now(), topicTtlMs: env.topicTtlMs });
  const stream = new DeltaStream(store, { bufferLimit: env.viewerBufferLimit });

  // Bridge pub-sub to the cache, and the differ to viewers
  broker.subscribe({
    id: "ingest",
    topicPattern: "*",
    callback: (msg) => {
      ingest.onEvent({ topic: msg.topic, payload: msg.payload, timestampMs: msg.publishedAtMs });
    },
  });
  differ.onDelta((delta) => stream.publish(delta));

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));
  app.use("/api", makeRoutes(env, store, broker, stream, ingest, differ, decoder));
  app.use(express.static(env.webPublicDir));

  const server = http.createServer(app);
  const gateway = new IngestGateway(server, broker, { path: env.ingestWsPath });

  return {
    app,
    server,
    store,
    broker,
    differ,
    stream,
    listen() {
      return new Promise<{ host: string; port: number }>((resolve, reject) => {
        server.once("error", reject);
        server.listen(env.port, env.host, () => {
          server.off("error", reject);
          differ.start();
          const addr = server.address();
          const port = addr && typeof addr === "object" ? addr.port : env.port;
          log.info(`listening on http://${env.host}:${port} (decoder: ${decoderName(decoder)})`);
          resolve({ host: env.host, port });
        });
      });
    },
    async close() {
      differ.stop();
      stream.closeAll();
      await gateway.close();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
