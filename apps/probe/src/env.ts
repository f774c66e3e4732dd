import { loadDotEnvFromCwd } from "@topicwatch/common";

loadDotEnvFromCwd(".env");

export type ProbeEnv = {
  serverBaseUrl: string;
  publishIntervalMs: number;
  topicPrefix: string;
  ingestWsPath: string;
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): ProbeEnv {
  const publishIntervalMs = Number(source.PUBLISH_INTERVAL_MS || "250");
  if (!Number.isInteger(publishIntervalMs) || publishIntervalMs <= 0) {
    throw new Error(`PUBLISH_INTERVAL_MS must be a positive integer (got "${source.PUBLISH_INTERVAL_MS}")`);
  }
  const ingestWsPath = source.INGEST_WS_PATH || "/ingest";
  if (!ingestWsPath.startsWith("/")) {
    throw new Error(`INGEST_WS_PATH must start with "/" (got "${ingestWsPath}")`);
  }
  return {
    serverBaseUrl: (source.SERVER_BASE_URL || "http://127.0.0.1:8080").replace(/\/+$/, ""),
    publishIntervalMs,
    topicPrefix: (source.TOPIC_PREFIX || "/robot").replace(/\/+$/, ""),
    ingestWsPath,
  };
}
