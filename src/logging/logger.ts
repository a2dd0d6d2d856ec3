/**
 * Logging
 *
 * Components take a `Logger` so the library stays quiet unless the caller
 * hands one in. The CLI builds a pino-backed logger that writes to stderr,
 * leaving stdout for command output.
 */

import pino, { type Level, type Logger as PinoLogger } from "pino";
import type { LogFields, Logger } from "../types.js";

export type LogLevel = Extract<Level, "debug" | "info" | "warn" | "error"> | "silent";

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Adapt a pino instance to the `Logger` interface
 */
export function fromPino(instance: PinoLogger): Logger {
  const write = (level: Exclude<LogLevel, "silent">) => (message: string, fields?: LogFields) => {
    if (fields) {
      instance[level](fields, message);
    } else {
      instance[level](message);
    }
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export function createLogger(name: string, level: LogLevel = "info"): Logger {
  if (level === "silent") return noopLogger;
  return fromPino(pino({ name, level }, pino.destination(2)));
}
