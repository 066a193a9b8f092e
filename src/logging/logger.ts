import pino from "pino";
import type { LogLevel } from "../config/config.js";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: LogLevel;
  /** Where log lines go. Defaults to stderr so stdout stays free for stream output. */
  destination?: pino.DestinationStream;
  /** Bound into every line, e.g. `{ component: "signer" }`. */
  bindings?: Record<string, unknown>;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const logger = pino(
    {
      name: "chatrelay",
      level: options.level ?? "info",
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: ["headers.sign", "headers.sid", "signature"],
        censor: "[REDACTED]",
      },
    },
    options.destination ?? pino.destination(2),
  );
  return options.bindings ? logger.child(options.bindings) : logger;
}

let silent: Logger | undefined;

/** Shared no-op logger used when a component is constructed without one. */
export function silentLogger(): Logger {
  silent ??= pino({ level: "silent" });
  return silent;
}
