import pino from "pino";
import type { DestinationStream, Level, Logger } from "pino";

export type { DestinationStream, Logger } from "pino";
export type LogLevel = Level;

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(pino.levels.values, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = DEFAULT_LOG_LEVEL): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

/** Stdout carries the report, so diagnostics default to stderr (fd 2). */
export function createLogger(
  level: LogLevel,
  destination: DestinationStream = pino.destination({ dest: 2, sync: true })
): Logger {
  return pino(
    {
      level,
      base: { app: "monthly-digest" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime
    },
    destination
  );
}
