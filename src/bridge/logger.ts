/**
 * Structured logging via pino.
 *
 * One root logger per process; components derive child loggers tagged
 * with their name so every line can be traced to its stage.
 */

import pino from "pino";

export type Logger = pino.Logger;

/** Paths whose values never reach the log output. */
const REDACT_PATHS = [
  "secret",
  "signature",
  "*.secret",
  "*.signature",
  'headers["x-nextcloud-talk-signature"]',
];

export interface LoggerOptions {
  level?: string;
  /** Log destination; defaults to stdout. */
  destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    name: "talk-ha-bridge",
    level: options.level ?? "info",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };
  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}

/** A logger that discards everything (tests, library use). */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
