import { createPublicKey, type KeyObject } from "node:crypto";
import { z } from "zod";
import type { Logger } from "../../lib/logger.js";
import { createSilentLogger } from "../../lib/logger.js";
import { Mutex } from "../../lib/mutex.js";
import { ConfigurationError, UpstreamFetchError } from "../errors.js";
import type { ProviderMetadata, SigningKeySet } from "../types/auth.js";

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<FetchResponseLike>;

export interface JwksServiceOptions {
  /** OpenID configuration document URL. */
  metadataUrl: string;
  cacheTtlSeconds: number;
  fetchFn?: FetchLike | undefined;
  timeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

export interface JwksStatus {
  issuer: string | null;
  jwksUri: string | null;
  keyCount: number;
  lastRefreshedAt: string | null;
  expiresAt: string | null;
  lastError: string | null;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

const metadataSchema = z.object({
  issuer: z.string().min(1),
  jwks_uri: z.string().url()
});

const jwksSchema = z.object({
  keys: z.array(z.unknown())
});

const rsaJwkSchema = z.object({
  kid: z.string().min(1),
  kty: z.literal("RSA"),
  use: z.string().optional(),
  alg: z.string().optional(),
  n: z.string().min(1),
  e: z.string().min(1)
});

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

/**
 * Provider metadata and signing key cache for one OpenID Connect tenant.
 *
 * Metadata is fetched once and kept for the process lifetime. The key set is
 * refreshed when older than the TTL, or on demand after a key miss. All
 * fetches are serialized through one mutex and re-check the cache after
 * acquiring it, so a burst of callers produces a single request.
 */
export class JwksService {
  private metadata: ProviderMetadata | null = null;
  private keySet: SigningKeySet | null = null;
  private lastError: string | null = null;
  private readonly mutex = new Mutex();
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: JwksServiceOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  get metadataUrl(): string {
    return this.options.metadataUrl;
  }

  async getMetadata(): Promise<ProviderMetadata> {
    if (this.metadata) {
      return this.metadata;
    }
    return this.mutex.runExclusive(async () => {
      if (this.metadata) {
        return this.metadata;
      }
      const url = this.options.metadataUrl;
      const body = await this.fetchJson(url, "OpenID configuration");
      const parsed = metadataSchema.safeParse(body);
      if (!parsed.success) {
        const message = `OpenID configuration at ${url} is missing issuer or jwks_uri.`;
        this.lastError = message;
        throw new ConfigurationError(message, "provider_metadata_invalid");
      }
      this.metadata = Object.freeze({
        issuer: parsed.data.issuer,
        jwksUri: parsed.data.jwks_uri
      });
      this.logger.info({ issuer: this.metadata.issuer }, "Loaded OpenID configuration");
      return this.metadata;
    });
  }

  /** The cached key set, refreshed first when missing or past its TTL. */
  async getKeySet(): Promise<SigningKeySet> {
    const current = this.keySet;
    if (current && !this.isStale(current)) {
      return current;
    }
    const metadata = await this.getMetadata();
    return this.mutex.runExclusive(async () => {
      const latest = this.keySet;
      if (latest && !this.isStale(latest)) {
        return latest;
      }
      return this.refreshKeySet(metadata);
    });
  }

  /**
   * Refresh regardless of TTL, unless another caller already replaced the
   * set with generation `seenGeneration` while this one waited for the lock.
   */
  async forceRefresh(seenGeneration: number | null): Promise<SigningKeySet> {
    const metadata = await this.getMetadata();
    return this.mutex.runExclusive(async () => {
      const latest = this.keySet;
      if (latest && latest.generation !== seenGeneration) {
        return latest;
      }
      return this.refreshKeySet(metadata);
    });
  }

  status(): JwksStatus {
    return {
      issuer: this.metadata?.issuer ?? null,
      jwksUri: this.metadata?.jwksUri ?? null,
      keyCount: this.keySet?.keys.size ?? 0,
      lastRefreshedAt: this.keySet ? new Date(this.keySet.fetchedAt).toISOString() : null,
      expiresAt: this.keySet ? new Date(this.keySet.expiresAt).toISOString() : null,
      lastError: this.lastError
    };
  }

  private isStale(keySet: SigningKeySet): boolean {
    return Date.now() >= keySet.expiresAt;
  }

  private async refreshKeySet(metadata: ProviderMetadata): Promise<SigningKeySet> {
    const body = await this.fetchJson(metadata.jwksUri, "JWKS");
    const parsed = jwksSchema.safeParse(body);
    if (!parsed.success) {
      const message = `JWKS payload from ${metadata.jwksUri} has no keys array.`;
      this.lastError = message;
      throw new UpstreamFetchError(metadata.jwksUri, message);
    }

    const keys = new Map<string, KeyObject>();
    for (const candidate of parsed.data.keys) {
      const jwk = rsaJwkSchema.safeParse(candidate);
      if (!jwk.success) {
        continue;
      }
      if (jwk.data.use !== undefined && jwk.data.use !== "sig") {
        continue;
      }
      try {
        keys.set(jwk.data.kid, createPublicKey({ key: { kty: "RSA", n: jwk.data.n, e: jwk.data.e }, format: "jwk" }));
      } catch (error) {
        this.logger.warn({ kid: jwk.data.kid, err: error }, "Skipping unusable signing key");
      }
    }

    const fetchedAt = Date.now();
    const next: SigningKeySet = Object.freeze({
      keys,
      fetchedAt,
      expiresAt: fetchedAt + this.options.cacheTtlSeconds * 1000,
      generation: (this.keySet?.generation ?? 0) + 1
    });
    this.keySet = next;
    this.lastError = null;
    this.logger.debug({ keyCount: keys.size, generation: next.generation }, "Refreshed signing keys");
    return next;
  }

  private async fetchJson(url: string, label: string): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new UpstreamFetchError(url, `${label} request timed out after ${this.timeoutMs} ms.`));
      }, this.timeoutMs);
    });

    const request = async (): Promise<unknown> => {
      const response = await this.fetchFn(url, { signal: controller.signal });
      if (!response.ok) {
        throw new UpstreamFetchError(url, `${label} request failed with HTTP ${response.status}.`);
      }
      return response.json();
    };

    this.logger.debug({ url }, `Fetching ${label}`);
    try {
      return await Promise.race([request(), timeout]);
    } catch (error) {
      const failure =
        error instanceof UpstreamFetchError
          ? error
          : new UpstreamFetchError(url, `Failed to load ${label}.`, { cause: error });
      this.lastError = failure.message;
      this.logger.error({ url, err: error }, failure.message);
      throw failure;
    } finally {
      clearTimeout(timer);
    }
  }
}
