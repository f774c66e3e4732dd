import fs from "node:fs";
import { z } from "zod";
import type { IngestEvent } from "@topicwatch/common";
import { topicMatches } from "../pubsub";
import type { DecoderMode } from "../env";

/** Pure payload-to-text conversion. May throw; the ingest adapter handles it. */
export type Decoder = (event: IngestEvent) => string;

export type DecoderCapability =
  | { kind: "none" }
  | { kind: "custom"; name: string; decode: Decoder };

export const NO_DECODER: DecoderCapability = { kind: "none" };

export function customDecoder(name: string, decode: Decoder): DecoderCapability {
  return { kind: "custom", name, decode };
}

export function decoderName(cap: DecoderCapability): string {
  return cap.kind === "none" ? "none" : cap.name;
}

// ── Built-in formats ──

export type DecoderFormat = "text" | "json" | "hex";

const HEX_PREVIEW_BYTES = 64;

const utf8 = new TextDecoder("utf-8");

export const FORMATS: Record<DecoderFormat, Decoder> = {
  text: (event) => utf8.decode(event.payload),
  json: (event) => JSON.stringify(JSON.parse(utf8.decode(event.payload))),
  hex: (event) => {
    const shown = event.payload.subarray(0, HEX_PREVIEW_BYTES);
    const hex = Array.from(shown, (b) => b.toString(16).padStart(2, "0")).join(" ");
    return event.payload.byteLength > HEX_PREVIEW_BYTES ? `${hex} …` : hex;
  },
};

// ── Registry: topic pattern -> format ──

export const DecoderRuleSchema = z.object({
  pattern: z.string().min(1),
  format: z.enum(["text", "json", "hex"]),
});

export const DecoderRulesSchema = z.array(DecoderRuleSchema);

export type DecoderRule = z.infer<typeof DecoderRuleSchema>;

/** First matching rule wins. Topics without a rule get a placeholder, not an error. */
export function createRegistryDecoder(rules: DecoderRule[]): Decoder {
  return (event) => {
    const rule = rules.find((r) => topicMatches(r.pattern, event.topic));
    if (!rule) return `No handler found for message on ${event.topic}`;
    return FORMATS[rule.format](event);
  };
}

export function loadDecoderRules(filePath: string): DecoderRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new Error(`Cannot read decoder rules from ${filePath}`, { cause: e });
  }
  const parsed = DecoderRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid decoder rules in ${filePath}: ${detail}`);
  }
  return parsed.data;
}

export function decoderFromEnv(mode: DecoderMode, rulesPath?: string): DecoderCapability {
  switch (mode) {
    case "none":
      return NO_DECODER;
    case "text":
    case "json":
    case "hex":
      return customDecoder(mode, FORMATS[mode]);
    case "rules":
      if (!rulesPath) throw new Error("DECODER=rules needs DECODER_RULES_PATH");
      return customDecoder("rules", createRegistryDecoder(loadDecoderRules(rulesPath)));
  }
}
