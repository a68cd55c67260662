import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(options: { level?: string; pretty?: boolean } = {}): Logger {
  return pino({
    name: "taskmesh",
    level: options.level ?? process.env.TASKMESH_LOG_LEVEL ?? "info",
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            singleLine: true,
          },
        }
      : undefined,
  });
}

export const logger = createLogger();
