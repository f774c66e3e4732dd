import { loadEnv } from "./env";
import { publisherMain } from "./publisher";
import { watcherMain } from "./watcher";

const USAGE = "usage: probe <publish|watch>";

async function main() {
  const mode = process.argv[2];
  const env = loadEnv();

  switch (mode) {
    case "publish":
      return publisherMain(env);
    case "watch":
      return watcherMain(env);
    default:
      console.error(USAGE);
      process.exitCode = 2;
  }
}

main().catch((e: unknown) => {
  console.error(`[probe] ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
