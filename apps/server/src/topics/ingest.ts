import { z } from "zod";
import { MAX_TIMESTAMP_MS, type IngestEvent, type IngestStats, type TopicRecord } from "@topicwatch/common";
import { DecodeError, TransportError, errorMessage } from "../errors";
import { createLogger } from "../log";
import type { DecoderCapability } from "./decoder";
import { escapeHtml } from "./escape";
import type { TopicStore } from "./store";

const log = createLogger("ingest");

const IngestEventSchema = z.object({
  topic: z.string().min(1),
  payload: z.instanceof(Uint8Array),
  timestampMs: z.number().finite().min(0).max(MAX_TIMESTAMP_MS),
});

function validate(event: unknown): IngestEvent {
  const parsed = IngestEventSchema.safeParse(event);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "event"}: ${i.message}`).join("; ");
    throw new TransportError(`malformed event (${detail})`);
  }
  return parsed.data;
}

export class IngestAdapter {
  private stats: IngestStats = { accepted: 0, rejected: 0, decodeFailures: 0 };

  constructor(
    private store: TopicStore,
    private decoder: DecoderCapability
  ) {}

  /**
   * Writes one transport event into the store. Never throws: a malformed
   * event is dropped, a decoder failure still updates size and timestamp.
   */
  onEvent(raw: unknown): TopicRecord | undefined {
    let event: IngestEvent;
    try {
      event = validate(raw);
    } catch (e) {
      this.stats.rejected++;
      log.error(`dropped event: ${errorMessage(e)}`);
      return undefined;
    }

    const record: TopicRecord = {
      name: event.topic,
      size_bytes: event.payload.byteLength,
      received_at: new Date(event.timestampMs).toISOString(),
    };

    const text = this.decode(event);
    if (text !== undefined) record.decoded_text = escapeHtml(text);

    this.store.upsert(record);
    this.stats.accepted++;
    log.debug(`received data for topic '${event.topic}' (${record.size_bytes} B)`);
    return record;
  }

  getStats(): IngestStats {
    return { ...this.stats };
  }

  private decode(event: IngestEvent): string | undefined {
    if (this.decoder.kind === "none") return undefined;
    try {
      const out: unknown = this.decoder.decode(event);
      if (typeof out !== "string") throw new DecodeError(event.topic, `decoder returned ${typeof out}`);
      return out;
    } catch (e) {
      const err = e instanceof DecodeError ? e : new DecodeError(event.topic, errorMessage(e), { cause: e });
      this.stats.decodeFailures++;
      log.warn(`error decoding message on ${err.topic}: ${err.message}`);
      return `Error decoding message on ${err.topic}: ${err.message}`;
    }
  }
}
