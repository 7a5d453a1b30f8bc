import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type MenuLogger = Logger;

export interface CreateLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

function envLogLevel(): string | undefined {
  if (typeof process === "undefined") return undefined;
  const raw = process.env.CASCADE_MENU_LOG_LEVEL;
  return raw && raw.trim() !== "" ? raw.trim() : undefined;
}

export function createLogger(options: CreateLoggerOptions = {}): MenuLogger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? envLogLevel() ?? "warn",
    base: {
      component: "cascade-menu",
    },
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
