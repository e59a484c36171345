// src/config/logger.ts
import pino, { type Logger } from "pino";
import type { AppConfig } from "./env";

export function createLogger(config: Pick<AppConfig, "log">): Logger {
  return pino({
    level: config.log.level,
    base: { service: config.log.service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: "message",
  });
}

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
