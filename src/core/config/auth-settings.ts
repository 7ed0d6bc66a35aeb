import { ConfigurationError } from "../errors.js";
import type { AuthSettings } from "../types/auth.js";

export const DEFAULT_AUTHORITY_HOST = "https://login.microsoftonline.com";
export const DEFAULT_JWKS_CACHE_TTL_SECONDS = 60 * 60;
export const DEFAULT_CLOCK_SKEW_SECONDS = 60;

export const AUTH_ENV = {
  tenantId: "DEVUI_AZURE_AD_TENANT_ID",
  audiences: "DEVUI_AZURE_AD_ALLOWED_AUDIENCES",
  requiredScopes: "DEVUI_AZURE_AD_REQUIRED_SCOPES",
  requiredRoles: "DEVUI_AZURE_AD_REQUIRED_APP_ROLES",
  authorityHost: "DEVUI_AZURE_AD_AUTHORITY_HOST",
  jwksCacheTtl: "DEVUI_AZURE_AD_JWKS_CACHE_TTL",
  clockSkew: "DEVUI_AZURE_AD_CLOCK_SKEW"
} as const;

type Env = Record<string, string | undefined>;

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/** Audiences split on commas and semicolons only. */
export function parseAudienceList(raw: string): string[] {
  return unique(
    raw
      .replace(/;/g, ",")
      .split(",")
      .map((value) => value.trim())
      .filter(Boolean)
  );
}

/** Commas, semicolons and whitespace all separate values; runs of separators collapse. */
export function parseEnvironmentList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return unique(
    raw
      .trim()
      .split(/[,\s;]+/)
      .filter(Boolean)
  );
}

function parseNonNegativeInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${name} must be a non-negative integer number of seconds (got "${trimmed}").`);
  }
  return Number.parseInt(trimmed, 10);
}

function normalizeAuthorityHost(raw: string | undefined): string {
  const value = raw?.trim() || DEFAULT_AUTHORITY_HOST;
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    throw new ConfigurationError(`${AUTH_ENV.authorityHost} must be an absolute URL (got "${value}").`, undefined, {
      cause: error
    });
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ConfigurationError(`${AUTH_ENV.authorityHost} must use http or https (got "${value}").`);
  }
  return value.replace(/\/+$/, "");
}

/**
 * Load identity provider settings from the environment.
 *
 * @throws ConfigurationError naming the variable to set when a required value
 * is missing or a value cannot be parsed.
 */
export function loadAuthSettings(env: Env = process.env): AuthSettings {
  const tenantId = env[AUTH_ENV.tenantId]?.trim();
  if (!tenantId) {
    throw new ConfigurationError(
      `${AUTH_ENV.tenantId} is not configured on the server. Set it to the directory (tenant) ID that issues tokens for this API.`
    );
  }

  const rawAudiences = env[AUTH_ENV.audiences];
  if (!rawAudiences || rawAudiences.trim().length === 0) {
    throw new ConfigurationError(
      `${AUTH_ENV.audiences} is not configured on the server. Set it to the application ID URI(s) accepted as token audience, separated by commas.`
    );
  }

  const audiences = parseAudienceList(rawAudiences);
  if (audiences.length === 0) {
    throw new ConfigurationError(`${AUTH_ENV.audiences} must contain at least one audience value.`);
  }

  return Object.freeze({
    tenantId,
    audiences: Object.freeze(audiences),
    requiredScopes: Object.freeze(parseEnvironmentList(env[AUTH_ENV.requiredScopes])),
    requiredRoles: Object.freeze(parseEnvironmentList(env[AUTH_ENV.requiredRoles])),
    authorityHost: normalizeAuthorityHost(env[AUTH_ENV.authorityHost]),
    jwksCacheTtlSeconds: parseNonNegativeInteger(
      AUTH_ENV.jwksCacheTtl,
      env[AUTH_ENV.jwksCacheTtl],
      DEFAULT_JWKS_CACHE_TTL_SECONDS
    ),
    clockSkewSeconds: parseNonNegativeInteger(AUTH_ENV.clockSkew, env[AUTH_ENV.clockSkew], DEFAULT_CLOCK_SKEW_SECONDS)
  });
}

export function openIdConfigurationUrl(settings: Pick<AuthSettings, "authorityHost" | "tenantId">): string {
  return `${settings.authorityHost}/${settings.tenantId}/v2.0/.well-known/openid-configuration`;
}
