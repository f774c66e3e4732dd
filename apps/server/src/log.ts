export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "warn";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string, err?: unknown): void;
  error(msg: string, err?: unknown): void;
};

function enabled(level: LogLevel) {
  return ORDER[level] >= ORDER[threshold];
}

// Console output tagged per component, e.g. "[ingest] ...".
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(msg) {
      if (enabled("debug")) console.debug(`${prefix} ${msg}`);
    },
    info(msg) {
      if (enabled("info")) console.log(`${prefix} ${msg}`);
    },
    warn(msg, err) {
      if (!enabled("warn")) return;
      if (err === undefined) console.warn(`${prefix} ${msg}`);
      else console.warn(`${prefix} ${msg}`, err);
    },
    error(msg, err) {
      if (!enabled("error")) return;
      if (err === undefined) console.error(`${prefix} ${msg}`);
      else console.error(`${prefix} ${msg}`, err);
    },
  };
}
