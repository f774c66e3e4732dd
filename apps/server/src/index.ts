import { loadDotEnvFromCwd } from "@topicwatch/common";
import { createTopicwatch } from "./app";
import { loadEnv } from "./env";
import { createLogger, setLogLevel } from "./log";

// Load apps/server/.env automatically when running via npm workspaces.
loadDotEnvFromCwd(".env");

const env = loadEnv();
setLogLevel(env.logLevel);

const log = createLogger("server");
const monitor = createTopicwatch(env);

monitor.listen().then(
  ({ host, port }) => {
    // Always shown, whatever LOG_LEVEL says.
    console.log(`[server] topic monitor on http://${host}:${port}`);
    console.log(`[server] updates every ${env.reloadPeriodMs}ms, ingest at ws://${host}:${port}${env.ingestWsPath}`);
  },
  (e: unknown) => {
    log.error("failed to start:", e);
    process.exit(1);
  }
);

let stopping = false;
function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  log.warn(`${signal} received, stopping`);
  monitor.close().then(
    () => process.exit(0),
    (e: unknown) => {
      log.error("shutdown failed:", e);
      process.exit(1);
    }
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
