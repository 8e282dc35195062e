/**
 * Structured JSON logging.
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  /** Log at debug level instead of info */
  verbose?: boolean;
  /** Explicit level; wins over `verbose` */
  level?: LevelWithSilent;
  /** Where lines go (default: stdout) */
  destination?: DestinationStream;
}

/** Paths whose values must never reach a log line. */
const REDACTED_PATHS = ["apiKey", "token", "credential.apiKey", "credentials[*].apiKey"];

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? (options.verbose ? "debug" : "info");
  const config = {
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}
