import pino from "pino";
import { loadEnv } from "../config/env.js";

let level = "info";
let nodeEnv = process.env.NODE_ENV ?? "development";
try {
  const env = loadEnv();
  nodeEnv = env.NODE_ENV;
  level = env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info");
} catch {
  // invalid env is reported by whoever loads it for real
}

const isDev = nodeEnv === "development";

export const logger = pino(
  { level },
  isDev
    ? pino.transport({
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" }
      })
    : undefined
);
