import { verify, type KeyObject } from "node:crypto";
import { openIdConfigurationUrl } from "../config/auth-settings.js";
import { AuthenticationError, AuthorizationError, ConfigurationError, UpstreamFetchError } from "../errors.js";
import type { ValidationFailure } from "../errors.js";
import type { Logger } from "../../lib/logger.js";
import { createSilentLogger } from "../../lib/logger.js";
import { nowSeconds } from "../../lib/time.js";
import type {
  AuthenticatedPrincipal,
  AuthSettings,
  ProviderMetadata,
  SigningKeySet,
  ValidationResult,
  ValidatorState
} from "../types/auth.js";
import { JwksService, type FetchLike } from "./jwks-service.js";

export interface TokenValidatorOptions {
  fetchFn?: FetchLike | undefined;
  fetchTimeoutMs?: number | undefined;
  logger?: Logger | undefined;
  jwksService?: JwksService | undefined;
}

type JsonRecord = Record<string, unknown>;

const SUPPORTED_ALGORITHM = "RS256";

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string): JsonRecord | null {
  try {
    const value: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

function verifySignature(signedPayload: string, signatureSegment: string, key: KeyObject): boolean {
  try {
    return verify("RSA-SHA256", Buffer.from(signedPayload), key, Buffer.from(signatureSegment, "base64url"));
  } catch {
    return false;
  }
}

/** Claim values arrive as arrays or delimited strings depending on the claim. */
function claimList(value: unknown, separator: string): string[] {
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0);
  }
  if (typeof value === "string") {
    return value
      .split(separator)
      .map((entry) => entry.trim())
      .filter(Boolean);
  }
  return [];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function intersects(values: readonly string[], required: readonly string[]): boolean {
  const present = new Set(values);
  return required.some((entry) => present.has(entry));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function reject(error: ValidationFailure): ValidationResult {
  return { ok: false, error };
}

/**
 * Verifies RS256 bearer tokens issued for one tenant and turns them into
 * principals. Lifecycle: `uninitialized` → `configuring` (during
 * `initialize()`) → `ready`.
 */
export class TokenValidator {
  readonly jwks: JwksService;
  private state: ValidatorState = "uninitialized";
  private initializing: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly settings: AuthSettings,
    options?: TokenValidatorOptions
  ) {
    this.logger = options?.logger ?? createSilentLogger();
    this.jwks =
      options?.jwksService ??
      new JwksService({
        metadataUrl: openIdConfigurationUrl(settings),
        cacheTtlSeconds: settings.jwksCacheTtlSeconds,
        fetchFn: options?.fetchFn,
        timeoutMs: options?.fetchTimeoutMs,
        logger: this.logger
      });
  }

  get status(): ValidatorState {
    return this.state;
  }

  /**
   * Load provider metadata and signing keys. Concurrent callers share one
   * attempt; once ready, later calls return immediately. A failure puts the
   * validator back to `uninitialized` and rejects.
   */
  initialize(): Promise<void> {
    if (this.state === "ready") {
      return Promise.resolve();
    }
    if (this.initializing) {
      return this.initializing;
    }

    this.state = "configuring";
    this.initializing = (async () => {
      try {
        const metadata = await this.jwks.getMetadata();
        const keySet = await this.jwks.getKeySet();
        this.state = "ready";
        this.logger.info(
          { issuer: metadata.issuer, keyCount: keySet.keys.size, tenantId: this.settings.tenantId },
          "Token validator ready"
        );
      } catch (error) {
        this.state = "uninitialized";
        throw error;
      } finally {
        this.initializing = null;
      }
    })();
    return this.initializing;
  }

  async validate(token: string): Promise<ValidationResult> {
    let metadata: ProviderMetadata;
    let keySet: SigningKeySet;
    try {
      metadata = await this.jwks.getMetadata();
      keySet = await this.jwks.getKeySet();
    } catch (error) {
      return this.upstreamFailure(error);
    }

    const segments = token.split(".");
    const [headerSegment, payloadSegment, signatureSegment] = segments;
    if (segments.length !== 3 || !headerSegment || !payloadSegment || !signatureSegment) {
      return reject(new AuthenticationError("invalid_token_header", "Unable to parse token header."));
    }

    const header = decodeSegment(headerSegment);
    if (!header) {
      return reject(new AuthenticationError("invalid_token_header", "Unable to parse token header."));
    }
    if (header.alg !== SUPPORTED_ALGORITHM) {
      return reject(new AuthenticationError("unsupported_algorithm", "Token must be signed with RS256."));
    }
    const keyId = optionalString(header.kid);
    if (!keyId) {
      return reject(new AuthenticationError("missing_key_id", "Token header missing 'kid' claim."));
    }

    let signingKey = keySet.keys.get(keyId);
    if (!signingKey) {
      // Key rotation: one forced refresh, then give up.
      try {
        keySet = await this.jwks.forceRefresh(keySet.generation);
      } catch (error) {
        return this.upstreamFailure(error);
      }
      signingKey = keySet.keys.get(keyId);
      if (!signingKey) {
        return reject(new AuthenticationError("unknown_signing_key", "Signing key not found for token."));
      }
    }

    if (!verifySignature(`${headerSegment}.${payloadSegment}`, signatureSegment, signingKey)) {
      return reject(new AuthenticationError("invalid_signature", "Token signature is invalid."));
    }

    const claims = decodeSegment(payloadSegment);
    if (!claims) {
      return reject(new AuthenticationError("invalid_token", "Token payload is not a JSON object."));
    }

    const timeFailure = this.checkTimeClaims(claims);
    if (timeFailure) {
      return reject(timeFailure);
    }

    const audiences = typeof claims.aud === "string" ? [claims.aud] : claimList(claims.aud, " ");
    if (!intersects(audiences, this.settings.audiences)) {
      return reject(new AuthenticationError("invalid_audience", "Token audience not accepted."));
    }

    if (claims.iss !== metadata.issuer) {
      return reject(new AuthenticationError("invalid_issuer", "Token issuer is not trusted."));
    }

    if (claims.tid !== undefined && typeof claims.tid !== "string") {
      return reject(new AuthenticationError("invalid_token", "Token tenant claim is malformed."));
    }
    const tokenTenant = optionalString(claims.tid);
    if (tokenTenant && tokenTenant.toLowerCase() !== this.settings.tenantId.toLowerCase()) {
      return reject(new AuthorizationError("tenant_mismatch", "Token tenant does not match configured tenant."));
    }

    const objectId = optionalString(claims.oid) ?? optionalString(claims.sub);
    if (!objectId) {
      return reject(new AuthenticationError("missing_subject", "Token does not contain required subject identifiers."));
    }

    const roles = claimList(claims.roles, ",");
    const scopes = claimList(claims.scp, " ");

    if (this.settings.requiredScopes.length > 0 && !intersects(scopes, this.settings.requiredScopes)) {
      return reject(new AuthorizationError("missing_scope", "Token missing required scope."));
    }
    if (this.settings.requiredRoles.length > 0 && !intersects(roles, this.settings.requiredRoles)) {
      return reject(new AuthorizationError("missing_role", "Token missing required application role."));
    }

    const principal: AuthenticatedPrincipal = deepFreeze({
      objectId,
      tenantId: tokenTenant ?? this.settings.tenantId,
      tenantVerification: tokenTenant ? "verified" : "claim_absent",
      name: optionalString(claims.name),
      preferredUsername: optionalString(claims.preferred_username) ?? optionalString(claims.upn),
      roles,
      scopes,
      claims
    });
    if (principal.tenantVerification === "claim_absent") {
      this.logger.debug({ objectId }, "Token has no tenant claim; tenant not verified");
    }
    return { ok: true, principal };
  }

  private checkTimeClaims(claims: JsonRecord): AuthenticationError | null {
    const now = nowSeconds();
    const skew = this.settings.clockSkewSeconds;
    const { exp, nbf, iat } = claims;

    if (typeof exp !== "number") {
      return new AuthenticationError("invalid_token", "Token is missing the 'exp' claim.");
    }
    if ((nbf !== undefined && typeof nbf !== "number") || (iat !== undefined && typeof iat !== "number")) {
      return new AuthenticationError("invalid_token", "Token time claims must be numeric.");
    }
    if (exp + skew <= now) {
      return new AuthenticationError("token_expired", "Token has expired.");
    }
    if ((typeof nbf === "number" && nbf - skew > now) || (typeof iat === "number" && iat - skew > now)) {
      return new AuthenticationError("token_not_yet_valid", "Token is not yet valid.");
    }
    return null;
  }

  /** Fetch problems during a live request are the caller's authentication failure, not a crash. */
  private upstreamFailure(error: unknown): ValidationResult {
    if (error instanceof ConfigurationError) {
      return reject(error);
    }
    if (error instanceof UpstreamFetchError) {
      this.logger.warn({ url: error.url }, "Signing material unavailable during validation");
      return reject(
        new AuthenticationError("signing_keys_unavailable", "Unable to load signing keys from the identity provider.", {
          cause: error
        })
      );
    }
    throw error;
  }
}
