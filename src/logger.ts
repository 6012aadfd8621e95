import pino from "pino";
import pretty from "pino-pretty";
import type { Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  /** Colourised, human-readable lines on stderr instead of JSON. */
  pretty?: boolean;
}

/**
 * Create the run logger. Built once by the CLI and handed to every component
 * through the provisioning context.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  if (options.pretty === false) {
    return pino({ name: "ws-provision", level }, pino.destination(2));
  }
  return pino(
    { name: "ws-provision", level },
    pretty({ colorize: true, destination: 2, sync: true, ignore: "pid,hostname,name", translateTime: "HH:MM:ss" }),
  );
}

/** Logger that discards everything: for tests and library callers that opt out. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
