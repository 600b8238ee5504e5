import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const base = { service: "tenure" };

  // pino rejects a transport together with an explicit destination stream.
  if (config?.file) {
    return pino({ level, base }, pino.destination(config.file));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  return pino({
    level,
    base,
    ...(transport ? { transport } : {}),
  });
}
