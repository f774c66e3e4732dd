export type SseFrame = {
  event: string;
  data: string;
  id?: string;
};

export type SseParseResult = {
  frames: SseFrame[];
  rest: string;
};

/** Encodes one Server-Sent Events frame. Multi-line data is split across `data:` lines. */
export function formatSseFrame(event: string, data: string): string {
  const lines = data.split(/\r?\n/).map((line) => `data: ${line}`);
  return `event: ${event}\n${lines.join("\n")}\n\n`;
}

/**
 * Splits a buffered event-stream body into complete frames.
 * Whatever follows the last blank line is returned as `rest` for the next read.
 * Comment lines (": ...") and frames without data are skipped.
 */
export function parseSseFrames(buffer: string): SseParseResult {
  const normalized = buffer.replace(/\r\n?/g, "\n");
  const blocks = normalized.split("\n\n");
  const rest = blocks.pop() ?? "";
  const frames: SseFrame[] = [];

  for (const block of blocks) {
    let event = "message";
    let id: string | undefined;
    const data: string[] = [];

    for (const line of block.split("\n")) {
      if (!line || line.startsWith(":")) continue;
      const idx = line.indexOf(":");
      const field = idx === -1 ? line : line.slice(0, idx);
      let value = idx === -1 ? "" : line.slice(idx + 1);
      if (value.startsWith(" ")) value = value.slice(1);

      if (field === "event") event = value;
      else if (field === "data") data.push(value);
      else if (field === "id") id = value;
    }

    if (data.length === 0) continue;
    frames.push(id === undefined ? { event, data: data.join("\n") } : { event, data: data.join("\n"), id });
  }

  return { frames, rest };
}
