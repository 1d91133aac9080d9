import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** JSON-lines logger on stderr, so stdout stays for the confirmation line. */
export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: "workbook-date-patcher",
    },
  };
  return pino(options, destination ?? pino.destination(2));
}
