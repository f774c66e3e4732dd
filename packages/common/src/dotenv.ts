import fs from "node:fs";
import path from "node:path";

const LINE_RE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

/** Parses KEY=value lines. Blank lines, comments and malformed lines are ignored. */
export function parseDotEnv(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const match = LINE_RE.exec(trimmed);
    if (!match) continue;
    const [, key, rawVal] = match;
    let val = rawVal.trim();

    // Strip simple quotes
    if ((val.startsWith("\"") && val.endsWith("\"")) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    out[key] = val;
  }
  return out;
}

// Only sets keys that aren't already present in process.env.
export function loadDotEnvFromCwd(fileName = ".env") {
  const filePath = path.resolve(process.cwd(), fileName);
  if (!fs.existsSync(filePath)) return;

  const vars = parseDotEnv(fs.readFileSync(filePath, "utf8"));
  for (const [key, val] of Object.entries(vars)) {
    if (process.env[key] === undefined) process.env[key] = val;
  }
}
