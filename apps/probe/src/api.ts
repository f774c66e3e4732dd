import {
  DeltaSchema,
  parseSseFrames,
  type Delta,
  type HealthResponse,
} from "@topicwatch/common";

export class ServerApi {
  constructor(private baseUrl: string, private ingestPath = "/ingest") {}

  get ingestUrl() {
    return `${this.baseUrl.replace(/^http/, "ws")}${this.ingestPath}`;
  }

  private async safeFetch(path: string, init?: RequestInit): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await fetch(url, init);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new Error(`Cannot reach server at ${this.baseUrl}. Start it with: npm run dev:server. Original error: ${reason}`);
    }
  }

  async health(): Promise<HealthResponse | undefined> {
    const res = await this.safeFetch("/api/health");
    if (!res.ok) return undefined;
    return (await res.json()) as HealthResponse;
  }

  /** Yields every delta on the event stream until the server closes it or `signal` aborts. */
  async *streamDeltas(signal?: AbortSignal): AsyncGenerator<Delta> {
    const res = await this.safeFetch("/api/sse", { signal, headers: { accept: "text/event-stream" } });
    if (!res.ok || !res.body) throw new Error(`stream failed: ${res.status}`);

    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    try {
      while (true) {
        const { value, done } = await reader.read();
        if (done) return;
        const { frames, rest } = parseSseFrames(buffer + decoder.decode(value, { stream: true }));
        buffer = rest;
        for (const frame of frames) {
          if (frame.event !== "message") continue;
          yield DeltaSchema.parse(JSON.parse(frame.data));
        }
      }
    } finally {
      await reader.cancel();
    }
  }
}
