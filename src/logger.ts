import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggingOptions {
  level: string;
}

let loggerInstance: Logger | null = null;

/**
 * (Re)configure the process logger. Output always goes to stderr: stdout
 * belongs to the stdio MCP transport.
 */
export function configureLogger(options: LoggingOptions): Logger {
  loggerInstance = pino({ level: options.level, base: undefined }, pino.destination(2));
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = pino({ level: "info", base: undefined }, pino.destination(2));
  }
  return loggerInstance;
}
