import type { KeyObject } from "node:crypto";
import type { ValidationFailure } from "../errors.js";

export interface AuthSettings {
  tenantId: string;
  audiences: readonly string[];
  requiredScopes: readonly string[];
  requiredRoles: readonly string[];
  authorityHost: string;
  jwksCacheTtlSeconds: number;
  clockSkewSeconds: number;
}

export interface ProviderMetadata {
  issuer: string;
  jwksUri: string;
}

export interface SigningKeySet {
  keys: ReadonlyMap<string, KeyObject>;
  fetchedAt: number;
  expiresAt: number;
  /** Increments on every successful refresh. */
  generation: number;
}

/**
 * `claim_absent` marks tokens without a `tid` claim: the principal carries
 * the configured tenant, but the token never asserted it.
 */
export type TenantVerification = "verified" | "claim_absent";

export interface AuthenticatedPrincipal {
  readonly objectId: string;
  readonly tenantId: string;
  readonly tenantVerification: TenantVerification;
  readonly name?: string | undefined;
  readonly preferredUsername?: string | undefined;
  readonly roles: readonly string[];
  readonly scopes: readonly string[];
  readonly claims: Readonly<Record<string, unknown>>;
}

export type ValidationResult =
  | { ok: true; principal: AuthenticatedPrincipal }
  | { ok: false; error: ValidationFailure };

export type ValidatorState = "uninitialized" | "configuring" | "ready";

export interface RequestAuth {
  principal: AuthenticatedPrincipal;
  token: string;
}
