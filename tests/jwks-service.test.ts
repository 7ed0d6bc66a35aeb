import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { UpstreamFetchError } from "../src/core/errors.js";
import { JwksService, type FetchLike } from "../src/core/services/jwks-service.js";
import {
  FakeIdentityProvider,
  JWKS_URL,
  METADATA_URL,
  TEST_ISSUER,
  createSigningKey,
  type TestSigningKey
} from "./support/identity-provider.js";

let primaryKey: TestSigningKey;
let secondaryKey: TestSigningKey;

beforeAll(() => {
  primaryKey = createSigningKey("key-1");
  secondaryKey = createSigningKey("key-2");
});

afterEach(() => {
  vi.useRealTimers();
});

function createService(idp: FakeIdentityProvider, overrides?: { cacheTtlSeconds?: number; fetchFn?: FetchLike; timeoutMs?: number }) {
  return new JwksService({
    metadataUrl: METADATA_URL,
    cacheTtlSeconds: overrides?.cacheTtlSeconds ?? 3600,
    fetchFn: overrides?.fetchFn ?? idp.fetch,
    timeoutMs: overrides?.timeoutMs
  });
}

describe("JwksService", () => {
  it("loads metadata once and serves keys from cache within the TTL", async () => {
    const idp = new FakeIdentityProvider([primaryKey]);
    const service = createService(idp);

    const metadata = await service.getMetadata();
    expect(metadata).toEqual({ issuer: TEST_ISSUER, jwksUri: JWKS_URL });

    const first = await service.getKeySet();
    const second = await service.getKeySet();
    expect(second).toBe(first);
    expect(first.generation).toBe(1);
    expect([...first.keys.keys()]).toEqual(["key-1"]);
    expect(idp.metadataRequests).toBe(1);
    expect(idp.jwksRequests).toBe(1);
  });

  it("refetches keys once the TTL has elapsed", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const idp = new FakeIdentityProvider([primaryKey]);
    const service = createService(idp, { cacheTtlSeconds: 60 });

    await service.getKeySet();
    vi.setSystemTime(new Date("2026-01-01T00:00:59Z"));
    await service.getKeySet();
    expect(idp.jwksRequests).toBe(1);

    vi.setSystemTime(new Date("2026-01-01T00:01:00Z"));
    const refreshed = await service.getKeySet();
    expect(idp.jwksRequests).toBe(2);
    expect(refreshed.generation).toBe(2);
    expect(idp.metadataRequests).toBe(1);
  });

  it("collapses concurrent cold-cache callers into one fetch", async () => {
    const idp = new FakeIdentityProvider([primaryKey]);
    const service = createService(idp);

    const sets = await Promise.all([service.getKeySet(), service.getKeySet(), service.getKeySet(), service.getKeySet()]);
    expect(new Set(sets).size).toBe(1);
    expect(idp.metadataRequests).toBe(1);
    expect(idp.jwksRequests).toBe(1);
  });

  it("skips a forced refresh when another caller already refreshed", async () => {
    const idp = new FakeIdentityProvider([primaryKey]);
    const service = createService(idp);
    const initial = await service.getKeySet();

    idp.keys.push(secondaryKey);
    const [a, b] = await Promise.all([
      service.forceRefresh(initial.generation),
      service.forceRefresh(initial.generation)
    ]);

    expect(a).toBe(b);
    expect(a.generation).toBe(2);
    expect([...a.keys.keys()]).toEqual(["key-1", "key-2"]);
    expect(idp.jwksRequests).toBe(2);
  });

  it("ignores keys not meant for signature verification", async () => {
    const idp = new FakeIdentityProvider([primaryKey]);
    idp.jwksBody = {
      keys: [
        primaryKey.jwk,
        { ...secondaryKey.jwk, use: "enc" },
        { kty: "EC", kid: "ec-key", crv: "P-256", x: "x", y: "y" },
        { kty: "RSA", n: "abc", e: "AQAB" }
      ]
    };
    const service = createService(idp);

    const keySet = await service.getKeySet();
    expect([...keySet.keys.keys()]).toEqual(["key-1"]);
  });

  it("reports invalid provider metadata as a configuration problem", async () => {
    const idp = new FakeIdentityProvider([primaryKey]);
    idp.metadataBody = { issuer: TEST_ISSUER };
    const service = createService(idp);

    await expect(service.getMetadata()).rejects.toMatchObject({
      name: "ConfigurationError",
      code: "provider_metadata_invalid",
      statusCode: 500
    });
    expect(service.status().lastError).toBe(`OpenID configuration at ${METADATA_URL} is missing issuer or jwks_uri.`);
  });

  it("surfaces HTTP failures as upstream fetch errors", async () => {
    const idp = new FakeIdentityProvider([primaryKey]);
    idp.jwksStatus = 503;
    const service = createService(idp);

    const error = await service.getKeySet().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error).toMatchObject({ url: JWKS_URL, message: "JWKS request failed with HTTP 503." });
    expect(service.status()).toMatchObject({
      issuer: TEST_ISSUER,
      keyCount: 0,
      lastError: "JWKS request failed with HTTP 503."
    });
  });

  it("aborts requests that exceed the timeout", async () => {
    const signals: AbortSignal[] = [];
    const hangingFetch: FetchLike = (_url, init) => {
      if (init?.signal) {
        signals.push(init.signal);
      }
      return new Promise(() => undefined);
    };
    const idp = new FakeIdentityProvider([primaryKey]);
    const service = createService(idp, { fetchFn: hangingFetch, timeoutMs: 25 });

    await expect(service.getMetadata()).rejects.toThrow("OpenID configuration request timed out after 25 ms.");
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });

  it("wraps network errors with the request label", async () => {
    const failingFetch: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const idp = new FakeIdentityProvider([primaryKey]);
    const service = createService(idp, { fetchFn: failingFetch });

    const error = await service.getMetadata().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error).toMatchObject({ message: "Failed to load OpenID configuration.", url: METADATA_URL });
  });
});
