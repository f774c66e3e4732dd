// ── Topic cache (wire shape) ──

export type TopicRecord = {
  name: string;
  size_bytes: number;
  received_at: string; // ISO-8601, millisecond resolution
  decoded_text?: string; // HTML-escaped
};

export type Delta = {
  updated: TopicRecord[];
  removed: string[];
};

// ── Ingest ──

export type IngestEvent = {
  topic: string;
  payload: Uint8Array;
  timestampMs: number;
};

export type PayloadEncoding = "utf8" | "base64" | "hex";

export type PublishRequest = {
  topic: string;
  payload: string;
  encoding?: PayloadEncoding;
  timestampMs?: number;
};

export type PublishResponse = {
  ok: true;
  topic: string;
  size_bytes: number;
};

// ── HTTP API ──

export type HealthResponse = {
  ok: true;
  decoder: string; // "none" or the decoder's name
  reloadPeriodMs: number;
};

export type TopicListResponse = {
  topics: TopicRecord[];
};

export type IngestStats = {
  accepted: number;
  rejected: number;
  decodeFailures: number;
};

export type StatsResponse = {
  topics: number;
  viewers: number;
  ingest: IngestStats;
  ticks: number;
  failedTicks: number;
};
