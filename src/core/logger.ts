import pino from "pino";
import { env, type Env } from "./config";

export type LogLevel = Env["LOG_LEVEL"];

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pretty = options.pretty ?? env.LOG_PRETTY;

  return pino({
    level: options.level ?? env.LOG_LEVEL,
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}

export type Logger = pino.Logger;

export const silentLogger: Logger = pino({ level: "silent" });
