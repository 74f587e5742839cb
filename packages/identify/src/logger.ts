/**
 * Logger construction.
 *
 * pino at the configured level; pretty-printed in development.
 */

import pino, { type Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger };

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    name: "chainprobe",
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** A logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
