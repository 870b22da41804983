// logger.ts
//
// Logs go to stderr; stdout is reserved for command output.

import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

const ROOT_NAME = "amadeus";

export function createLogger(options: { level?: LevelWithSilent; pretty?: boolean } = {}): Logger {
  const { level = "info", pretty = process.stderr.isTTY === true } = options;

  if (pretty) {
    return pino({
      name: ROOT_NAME,
      level,
      transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
    });
  }
  return pino({ name: ROOT_NAME, level }, pino.destination(2));
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
