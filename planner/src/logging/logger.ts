import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

import type { LogLevel } from "../config/settings.js";

export type { Logger };

/**
 * JSON logger with upper-case severities and ISO timestamps. Components take
 * a child logger tagged with `component`.
 */
export function createLogger(params: {
  level: LogLevel;
  service?: string;
  destination?: DestinationStream;
}): Logger {
  const options: LoggerOptions = {
    level: params.level,
    base: { service: params.service ?? "socratic-planner" },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ severity: label.toUpperCase() })
    }
  };
  return params.destination ? pino(options, params.destination) : pino(options);
}

/** Logger for tests and library callers that want no output. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
