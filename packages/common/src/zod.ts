import { z } from "zod";

// ── Ingest ──

/** 9999-12-31T23:59:59.999Z, the last instant with a four-digit ISO year. */
export const MAX_TIMESTAMP_MS = 253_402_300_799_999;

export const PayloadEncodingSchema = z.enum(["utf8", "base64", "hex"]);

export const PublishRequestSchema = z.object({
  topic: z.string().min(1),
  payload: z.string(),
  encoding: PayloadEncodingSchema.default("utf8"),
  timestampMs: z.number().int().nonnegative().max(MAX_TIMESTAMP_MS).optional()
});

// ── Delta stream ──

export const TopicRecordSchema = z.object({
  name: z.string().min(1),
  size_bytes: z.number().int().nonnegative(),
  received_at: z.string().datetime(),
  decoded_text: z.string().optional()
});

export const DeltaSchema = z.object({
  updated: z.array(TopicRecordSchema),
  removed: z.array(z.string())
});
