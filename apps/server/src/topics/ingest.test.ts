import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MAX_TIMESTAMP_MS } from "@topicwatch/common";
import { IngestAdapter } from "./ingest";
import { NO_DECODER, customDecoder, FORMATS } from "./decoder";
import { escapeHtml } from "./escape";
import { TopicStore } from "./store";

const TS = Date.parse("2025-03-01T12:00:00.000Z");
const bytes = (s: string) => new TextEncoder().encode(s);

let store: TopicStore;

beforeEach(() => {
  store = new TopicStore();
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("escapeHtml", () => {
  it("escapes the five HTML-significant characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
    );
  });

  it("leaves plain text alone", () => {
    expect(escapeHtml("x: 1.5, y: -2")).toBe("x: 1.5, y: -2");
  });
});

describe("IngestAdapter without a decoder", () => {
  it("stores size and timestamp, no decoded_text", () => {
    const ingest = new IngestAdapter(store, NO_DECODER);
    const rec = ingest.onEvent({ topic: "/robot/pose", payload: new Uint8Array(48), timestampMs: TS });

    expect(rec).toEqual({ name: "/robot/pose", size_bytes: 48, received_at: "2025-03-01T12:00:00.000Z" });
    expect(store.get("/robot/pose")).toEqual(rec);
    expect(ingest.getStats()).toEqual({ accepted: 1, rejected: 0, decodeFailures: 0 });
  });

  it("accepts a Buffer payload", () => {
    const ingest = new IngestAdapter(store, NO_DECODER);
    ingest.onEvent({ topic: "/b", payload: Buffer.from("abc"), timestampMs: TS });
    expect(store.get("/b")?.size_bytes).toBe(3);
  });
});

describe("IngestAdapter with a decoder", () => {
  it("stores the decoded text escaped", () => {
    const ingest = new IngestAdapter(store, customDecoder("text", FORMATS.text));
    ingest.onEvent({ topic: "/chat", payload: bytes("<script>alert(1)</script>"), timestampMs: TS });

    const text = store.get("/chat")?.decoded_text;
    expect(text).toBe("&lt;script&gt;alert(1)&lt;/script&gt;");
    expect(text).not.toMatch(/[<>]/);
  });

  it("passes the whole event to the decoder", () => {
    const decode = vi.fn(() => "ok");
    const ingest = new IngestAdapter(store, customDecoder("spy", decode));
    const event = { topic: "/t", payload: bytes("p"), timestampMs: TS };
    ingest.onEvent(event);
    expect(decode).toHaveBeenCalledWith(event);
  });

  it("falls back to an error text when the decoder throws", () => {
    const ingest = new IngestAdapter(
      store,
      customDecoder("broken", () => {
        throw new Error("bad <frame>");
      })
    );
    ingest.onEvent({ topic: "/t", payload: new Uint8Array(7), timestampMs: TS });

    expect(store.get("/t")).toEqual({
      name: "/t",
      size_bytes: 7,
      received_at: "2025-03-01T12:00:00.000Z",
      decoded_text: "Error decoding message on /t: bad &lt;frame&gt;",
    });
    expect(ingest.getStats()).toEqual({ accepted: 1, rejected: 0, decodeFailures: 1 });
    expect(console.warn).toHaveBeenCalledWith("[ingest] error decoding message on /t: bad <frame>");
  });

  it("treats a non-string result as a decode failure", () => {
    // A decoder written without types can hand back anything.
    const ingest = new IngestAdapter(store, customDecoder("numbers", () => JSON.parse("42")));
    ingest.onEvent({ topic: "/n", payload: new Uint8Array(1), timestampMs: TS });

    expect(store.get("/n")?.decoded_text).toBe("Error decoding message on /n: decoder returned number");
    expect(ingest.getStats().decodeFailures).toBe(1);
  });
});

describe("IngestAdapter with a malformed event", () => {
  it.each([
    ["no topic", { payload: new Uint8Array(1), timestampMs: TS }],
    ["empty topic", { topic: "", payload: new Uint8Array(1), timestampMs: TS }],
    ["string payload", { topic: "/t", payload: "abc", timestampMs: TS }],
    ["NaN timestamp", { topic: "/t", payload: new Uint8Array(1), timestampMs: NaN }],
    ["timestamp past year 9999", { topic: "/t", payload: new Uint8Array(1), timestampMs: MAX_TIMESTAMP_MS + 1 }],
    ["not an object", null],
  ])("drops an event with %s", (_label, event) => {
    const ingest = new IngestAdapter(store, NO_DECODER);
    expect(ingest.onEvent(event)).toBeUndefined();
    expect(store.size).toBe(0);
    expect(ingest.getStats()).toEqual({ accepted: 0, rejected: 1, decodeFailures: 0 });
  });

  it("accepts the last representable millisecond", () => {
    const ingest = new IngestAdapter(store, NO_DECODER);
    ingest.onEvent({ topic: "/late", payload: new Uint8Array(1), timestampMs: MAX_TIMESTAMP_MS });
    expect(store.get("/late")?.received_at).toBe("9999-12-31T23:59:59.999Z");
    expect(ingest.getStats().rejected).toBe(0);
  });

  it("keeps ingesting after a bad event", () => {
    const ingest = new IngestAdapter(store, NO_DECODER);
    ingest.onEvent({ topic: "" });
    ingest.onEvent({ topic: "/ok", payload: new Uint8Array(2), timestampMs: TS });
    expect(store.list().map((r) => r.name)).toEqual(["/ok"]);
  });
});
