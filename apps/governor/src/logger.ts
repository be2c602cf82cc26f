/**
 * Shared pino setup. Fastify takes the options, everything outside a
 * request (deployment, the epoch keeper when run standalone) takes a logger.
 */

import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function loggerOptions(level: string, pretty: boolean): LoggerOptions {
  if (!pretty) return { level };
  return {
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss.l" },
    },
  };
}

export function createLogger(level: string, pretty = false): Logger {
  return pino(loggerOptions(level, pretty));
}
