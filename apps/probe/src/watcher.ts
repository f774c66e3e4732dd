import type { Delta, TopicRecord } from "@topicwatch/common";
import { ServerApi } from "./api";
import type { ProbeEnv } from "./env";

function log(msg: string) {
  console.log(`[watcher] ${msg}`);
}

export type AppliedDelta = {
  added: string[];
  changed: string[];
  removed: string[];
};

/** Client-side apply: upsert `updated` by name, then drop `removed`. */
export function applyDelta(table: Map<string, TopicRecord>, delta: Delta): AppliedDelta {
  const applied: AppliedDelta = { added: [], changed: [], removed: [] };
  for (const record of delta.updated) {
    (table.has(record.name) ? applied.changed : applied.added).push(record.name);
    table.set(record.name, record);
  }
  for (const name of delta.removed) {
    if (table.delete(name)) applied.removed.push(name);
  }
  return applied;
}

export function describeRecord(record: TopicRecord): string {
  const base = `${record.name}  ${record.size_bytes} B  @ ${record.received_at}`;
  return record.decoded_text === undefined ? base : `${base}  ${record.decoded_text}`;
}

export async function watcherMain(env: ProbeEnv) {
  const api = new ServerApi(env.serverBaseUrl);
  const table = new Map<string, TopicRecord>();
  const abort = new AbortController();
  process.once("SIGINT", () => abort.abort());

  const health = await api.health();
  if (!health) throw new Error(`Server health check failed at ${env.serverBaseUrl}.`);
  log(`watching ${env.serverBaseUrl} (decoder: ${health.decoder}, period: ${health.reloadPeriodMs}ms)`);

  try {
    for await (const delta of api.streamDeltas(abort.signal)) {
      const { added, changed, removed } = applyDelta(table, delta);
      for (const name of [...added, ...changed]) {
        const record = table.get(name);
        if (record) log(`${added.includes(name) ? "+" : "~"} ${describeRecord(record)}`);
      }
      for (const name of removed) log(`- ${name}`);
    }
  } catch (e) {
    if (!abort.signal.aborted) throw e;
  }
  log(`stopped with ${table.size} topics`);
}
