import path from "node:path";
import { z } from "zod";
import type { LogLevel } from "./log";

export type DecoderMode = "none" | "text" | "json" | "hex" | "rules";

export type ServerEnv = {
  host: string;
  port: number;
  reloadPeriodMs: number;
  decoder: DecoderMode;
  decoderRulesPath?: string;
  topicTtlMs?: number;
  viewerBufferLimit: number;
  ingestWsPath: string;
  webPublicDir: string;
  logLevel: LogLevel;
};

const positiveInt = (name: string) =>
  z.coerce.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be an integer`).positive(`${name} must be > 0`);

const EnvSchema = z.object({
  LISTEN_ADDRESS: z.string().default("127.0.0.1:8080"),
  RELOAD_PERIOD_MS: positiveInt("RELOAD_PERIOD_MS").default(1000),
  DECODER: z.enum(["none", "text", "json", "hex", "rules"]).default("none"),
  DECODER_RULES_PATH: z.string().min(1).optional(),
  TOPIC_TTL_MS: positiveInt("TOPIC_TTL_MS").optional(),
  VIEWER_BUFFER_LIMIT: positiveInt("VIEWER_BUFFER_LIMIT").default(64),
  INGEST_WS_PATH: z.string().startsWith("/").default("/ingest"),
  WEB_PUBLIC_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
});

/** Splits "host:port" or "[v6]:port". An empty host binds every interface. */
export function parseListenAddress(value: string): { host: string; port: number } {
  const m = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d{1,5})$/.exec(value.trim());
  const port = m ? Number(m[3]) : NaN;
  if (!m || port > 65535) {
    throw new Error(`LISTEN_ADDRESS must be host:port (got "${value}")`);
  }
  return { host: m[1] ?? (m[2] || "0.0.0.0"), port };
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  // Empty strings count as unset.
  const raw = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid server environment: ${detail}`);
  }
  const e = parsed.data;

  if (e.DECODER === "rules" && !e.DECODER_RULES_PATH) {
    throw new Error("Invalid server environment: DECODER_RULES_PATH is required when DECODER=rules");
  }

  const { host, port } = parseListenAddress(e.LISTEN_ADDRESS);

  const webPublicDir = e.WEB_PUBLIC_DIR ?? path.resolve(__dirname, "../public");

  return {
    host,
    port,
    reloadPeriodMs: e.RELOAD_PERIOD_MS,
    decoder: e.DECODER,
    decoderRulesPath: e.DECODER_RULES_PATH,
    topicTtlMs: e.TOPIC_TTL_MS,
    viewerBufferLimit: e.VIEWER_BUFFER_LIMIT,
    ingestWsPath: e.INGEST_WS_PATH,
    webPublicDir,
    logLevel: e.LOG_LEVEL,
  };
}
