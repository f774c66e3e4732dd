import type { Delta, TopicRecord } from "@topicwatch/common";
import { SnapshotError, errorMessage } from "../errors";
import { createLogger } from "../log";
import { compareNames, type Snapshot, type TopicStore } from "./store";

const log = createLogger("differ");

const EMPTY: Snapshot = new Map();

/** The fields compared to decide whether a topic changed since the last diff. */
export function fingerprint(record: TopicRecord): string {
  return JSON.stringify([record.size_bytes, record.received_at, record.decoded_text ?? null]);
}

export function diffSnapshots(previous: Snapshot, current: Snapshot): Delta {
  const updated: TopicRecord[] = [];
  const removed: string[] = [];

  for (const [name, record] of current) {
    const before = previous.get(name);
    if (!before || fingerprint(before) !== fingerprint(record)) updated.push(record);
  }
  for (const name of previous.keys()) {
    if (!current.has(name)) removed.push(name);
  }

  updated.sort((a, b) => compareNames(a.name, b.name));
  removed.sort(compareNames);
  return { updated, removed };
}

export function isEmptyDelta(delta: Delta) {
  return delta.updated.length === 0 && delta.removed.length === 0;
}

export type DifferState = "idle" | "diffing";

export type DeltaListener = (delta: Delta) => void;

export type SnapshotDifferDeps = {
  nowMs: () => number;
  /** Topics not updated for this long are evicted before each diff. */
  topicTtlMs?: number;
};

/**
 * Polls the store every `reloadPeriodMs` and emits what changed since the
 * previous tick. An upsert becomes visible to viewers at most one period later.
 */
export class SnapshotDiffer {
  private previous: Snapshot = EMPTY;
  private listeners = new Set<DeltaListener>();
  private timer: NodeJS.Timeout | undefined;
  private _state: DifferState = "idle";
  private ticks = 0;
  private failedTicks = 0;

  constructor(
    private store: TopicStore,
    private reloadPeriodMs: number,
    private deps: SnapshotDifferDeps = { nowMs: () => Date.now() }
  ) {
    if (!Number.isInteger(reloadPeriodMs) || reloadPeriodMs <= 0) {
      throw new Error(`reloadPeriodMs must be a positive integer (got ${reloadPeriodMs})`);
    }
  }

  get state(): DifferState {
    return this._state;
  }

  get running() {
    return this.timer !== undefined;
  }

  onDelta(listener: DeltaListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.reloadPeriodMs);
    log.info(`diffing every ${this.reloadPeriodMs}ms`);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  /**
   * One diff cycle. On failure the previous snapshot is kept so the next
   * tick reports everything that changed since the last good one.
   */
  tick(): Delta | undefined {
    if (this._state === "diffing") return undefined;
    this._state = "diffing";
    this.ticks++;

    let delta: Delta;
    try {
      if (this.deps.topicTtlMs !== undefined) {
        const evicted = this.store.evictOlderThan(this.deps.nowMs() - this.deps.topicTtlMs);
        if (evicted.length > 0) log.info(`evicted ${evicted.length} stale topic(s)`);
      }
      const current = this.store.snapshot();
      delta = diffSnapshots(this.previous, current);
      this.previous = current;
    } catch (e) {
      this.failedTicks++;
      const err = new SnapshotError(`diff failed: ${errorMessage(e)}`, { cause: e });
      log.error(err.message, e);
      return undefined;
    } finally {
      this._state = "idle";
    }

    if (!isEmptyDelta(delta)) {
      log.debug(`${delta.updated.length} updated, ${delta.removed.length} removed`);
    }
    for (const listener of this.listeners) {
      try {
        listener(delta);
      } catch (e) {
        log.error("delta listener error:", e);
      }
    }
    return delta;
  }

  getStats() {
    return { ticks: this.ticks, failedTicks: this.failedTicks };
  }
}
