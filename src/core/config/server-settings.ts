import { ConfigurationError } from "../errors.js";

export interface ServerSettings {
  port: number;
  host: string;
  corsOrigins: string[];
  bodyLimitBytes: number;
  logLevel: string;
  protectedPrefixes: string[];
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function parsePositiveInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }
  const parsed = Number.parseInt(raw.trim(), 10);
  if (!/^\d+$/.test(raw.trim()) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got "${raw.trim()}").`);
  }
  return parsed;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) {
    return fallback;
  }
  const values = raw
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
  return values.length > 0 ? values : fallback;
}

function normalizePrefix(prefix: string): string {
  const withSlash = prefix.startsWith("/") ? prefix : `/${prefix}`;
  return withSlash.length > 1 ? withSlash.replace(/\/+$/, "") : withSlash;
}

export function loadServerSettings(env: Env = process.env): ServerSettings {
  const port = parsePositiveInteger("PORT", env.PORT, 8080);
  if (port > 65535) {
    throw new ConfigurationError(`PORT must be at most 65535 (got ${port}).`);
  }

  const logLevel = (env.DEVUI_LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!LOG_LEVELS.has(logLevel)) {
    throw new ConfigurationError(
      `DEVUI_LOG_LEVEL must be one of ${[...LOG_LEVELS].join(", ")} (got "${env.DEVUI_LOG_LEVEL ?? ""}").`
    );
  }

  return {
    port,
    host: env.HOST?.trim() || "127.0.0.1",
    corsOrigins: parseList(env.DEVUI_CORS_ORIGINS, ["*"]),
    bodyLimitBytes: parsePositiveInteger("DEVUI_BODY_LIMIT_BYTES", env.DEVUI_BODY_LIMIT_BYTES, 1_048_576),
    logLevel,
    protectedPrefixes: parseList(env.DEVUI_PROTECTED_PREFIXES, ["/v1"]).map(normalizePrefix)
  };
}
