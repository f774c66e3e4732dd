import type { TopicRecord } from "@topicwatch/common";

export type Snapshot = ReadonlyMap<string, TopicRecord>;

/**
 * Latest record per topic. The ingest adapter is the only writer and the
 * differ the only reader; records are frozen and swapped whole, so a
 * snapshot never sees a half-written entry.
 */
export class TopicStore {
  private topics = new Map<string, Readonly<TopicRecord>>();

  upsert(record: TopicRecord) {
    this.topics.set(record.name, Object.freeze({ ...record }));
  }

  get(name: string): TopicRecord | undefined {
    return this.topics.get(name);
  }

  get size() {
    return this.topics.size;
  }

  snapshot(): Snapshot {
    return new Map(this.topics);
  }

  list(): TopicRecord[] {
    return Array.from(this.topics.values()).sort((a, b) => compareNames(a.name, b.name));
  }

  /** Drops topics last updated before `cutoffMs`. Only used when a TTL is configured. */
  evictOlderThan(cutoffMs: number): string[] {
    const evicted: string[] = [];
    for (const [name, record] of this.topics) {
      if (Date.parse(record.received_at) < cutoffMs) {
        this.topics.delete(name);
        evicted.push(name);
      }
    }
    return evicted.sort(compareNames);
  }
}

// Code-unit order, so the result doesn't depend on the host locale.
export function compareNames(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}
