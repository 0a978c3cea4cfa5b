import { pino, type LoggerOptions } from "pino";
import type { FastifyBaseLogger } from "fastify";

const isDev = process.env.NODE_ENV !== "production";

/**
 * Process-wide logger, shared with Fastify as its `loggerInstance`.
 * Pretty output in development, structured JSON in production.
 */
export function createLogger(level = "info"): FastifyBaseLogger {
  const options: LoggerOptions = isDev
    ? {
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }
    : { level };
  return pino(options);
}
