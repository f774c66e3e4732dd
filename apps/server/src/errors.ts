export type TopicwatchErrorKind = "transport" | "decode" | "snapshot" | "session";

export class TopicwatchError extends Error {
  constructor(
    readonly kind: TopicwatchErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed ingest event or frame. Nothing is written to the cache. */
export class TransportError extends TopicwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport", message, options);
  }
}

export class DecodeError extends TopicwatchError {
  constructor(
    readonly topic: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("decode", message, options);
  }
}

export class SnapshotError extends TopicwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("snapshot", message, options);
  }
}

export class SessionError extends TopicwatchError {
  constructor(
    readonly sessionId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("session", message, options);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
