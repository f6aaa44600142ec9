import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = "info"): Logger {
  return pino({
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger that drops everything. Used by tests and as a library default. */
export const silentLogger: Logger = pino({ level: "silent" });
