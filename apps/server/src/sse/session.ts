import { SessionError, errorMessage } from "../errors";
import { createLogger } from "../log";

const log = createLogger("sse");

/** The slice of http.ServerResponse a session writes to. */
export interface SseSink {
  write(chunk: string): boolean;
  end(): void;
  on(event: "drain" | "close" | "error", listener: () => void): unknown;
}

export type ViewerSessionOptions = {
  /** Frames queued behind a stalled socket before the viewer is dropped. */
  bufferLimit: number;
  onClose: (session: ViewerSession, reason?: SessionError) => void;
};

/**
 * One connected viewer. Frames are written straight through until the socket
 * reports back-pressure, then queued until "drain". A viewer that falls more
 * than `bufferLimit` frames behind is disconnected rather than skipped, so it
 * reconnects and starts again from a full snapshot.
 */
export class ViewerSession {
  private queue: string[] = [];
  private blocked = false;
  private closed = false;

  constructor(
    readonly id: string,
    private sink: SseSink,
    private opts: ViewerSessionOptions
  ) {
    sink.on("drain", () => this.flush());
    sink.on("close", () => this.finish());
    sink.on("error", () => this.finish(new SessionError(id, "channel error")));
  }

  get isClosed() {
    return this.closed;
  }

  get queued() {
    return this.queue.length;
  }

  send(frame: string): boolean {
    if (this.closed) return false;
    if (this.blocked) {
      this.queue.push(frame);
      if (this.queue.length > this.opts.bufferLimit) {
        this.close(new SessionError(this.id, `buffer overflow (${this.queue.length} frames queued)`));
        return false;
      }
      return true;
    }
    return this.write(frame);
  }

  close(reason?: SessionError) {
    if (this.closed) return;
    // Mark closed first: end() emits "close" synchronously on some sinks.
    this.finish(reason);
    try {
      this.sink.end();
    } catch (e) {
      log.debug(`viewer ${this.id} end failed: ${errorMessage(e)}`);
    }
  }

  private write(frame: string): boolean {
    try {
      if (!this.sink.write(frame)) this.blocked = true;
      return true;
    } catch (e) {
      this.close(new SessionError(this.id, `write failed: ${errorMessage(e)}`, { cause: e }));
      return false;
    }
  }

  private flush() {
    this.blocked = false;
    while (!this.blocked && !this.closed && this.queue.length > 0) {
      const frame = this.queue.shift();
      if (frame !== undefined) this.write(frame);
    }
  }

  private finish(reason?: SessionError) {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.opts.onClose(this, reason);
  }
}
