import WebSocket from "ws";
import type { PublishRequest } from "@topicwatch/common";
import { ServerApi } from "./api";
import type { ProbeEnv } from "./env";

function log(msg: string) {
  console.log(`[publisher] ${msg}`);
}

/**
 * Messages for one simulated tick. Pose and velocity change every tick,
 * battery every 4th, status every 20th and camera info only on the first,
 * so a watcher sees a mix of hot and idle topics.
 */
export function simulate(tick: number, prefix: string, nowMs: number): PublishRequest[] {
  const t = tick / 10;
  const out: PublishRequest[] = [
    json(`${prefix}/pose`, { x: round(Math.cos(t) * 2), y: round(Math.sin(t) * 2), theta: round(t % (2 * Math.PI)) }, nowMs),
    json(`${prefix}/cmd_vel`, { linear: round(0.5 + 0.1 * Math.sin(t)), angular: round(0.2 * Math.cos(t)) }, nowMs),
  ];
  if (tick % 4 === 0) out.push(json(`${prefix}/battery`, { percent: Math.max(0, 100 - Math.floor(tick / 40)) }, nowMs));
  if (tick % 20 === 0) out.push(json(`${prefix}/status`, { mode: tick % 40 === 0 ? "explore" : "return", tick }, nowMs));
  if (tick === 0) {
    out.push(json(`${prefix}/camera/info`, { width: 640, height: 480, encoding: "rgb8" }, nowMs));
  }
  return out;
}

function json(topic: string, value: unknown, timestampMs: number): PublishRequest {
  return { topic, payload: JSON.stringify(value), encoding: "utf8", timestampMs };
}

function round(n: number) {
  return Math.round(n * 1000) / 1000;
}

export async function publisherMain(env: ProbeEnv) {
  const api = new ServerApi(env.serverBaseUrl, env.ingestWsPath);

  log("Simulated publisher starting");
  log(`server:   ${env.serverBaseUrl}`);
  log(`interval: ${env.publishIntervalMs}ms`);

  // Fail fast if the server isn't up.
  const health = await api.health();
  if (!health) throw new Error(`Server health check failed at ${env.serverBaseUrl}.`);

  const socket = new WebSocket(api.ingestUrl);
  await new Promise<void>((resolve, reject) => {
    socket.once("open", () => resolve());
    socket.once("error", reject);
  });
  log(`connected to ${api.ingestUrl}`);

  socket.on("message", (data) => log(`server: ${data.toString()}`));

  let tick = 0;
  const timer = setInterval(() => {
    for (const msg of simulate(tick, env.topicPrefix, Date.now())) socket.send(JSON.stringify(msg));
    tick++;
    if (tick % 40 === 0) log(`published ${tick} ticks`);
  }, env.publishIntervalMs);

  await new Promise<void>((resolve) => {
    const stop = () => {
      clearInterval(timer);
      socket.close();
      resolve();
    };
    socket.once("close", stop);
    process.once("SIGINT", stop);
  });
  log("stopped");
}
