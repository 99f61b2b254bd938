/**
 * Structured logging.
 *
 * One pino instance per process, passed down explicitly. Library code never
 * creates its own logger when one is injected.
 */

import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
  /** Write to stderr, leaving stdout to command output. */
  stderr?: boolean;
}

export const LOG_LEVELS: ReadonlyArray<LevelWithSilent> = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    name: options.name ?? "sealgate",
    level: options.level ?? "info",
  };
  return options.stderr ? pino(settings, pino.destination(2)) : pino(settings);
}

/** Logger that discards everything; the default for library consumers and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
