import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

export type Logger = FastifyBaseLogger;

export interface LoggerOptions {
  level?: string | undefined;
  name?: string | undefined;
}

export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: options?.name ?? "devui-gateway",
    level: options?.level ?? process.env.DEVUI_LOG_LEVEL ?? "info",
    redact: {
      paths: ["req.headers.authorization", "headers.authorization", "token", "accessToken"],
      censor: "[redacted]"
    }
  });
}

export function createSilentLogger(): Logger {
  return createLogger({ level: "silent" });
}
