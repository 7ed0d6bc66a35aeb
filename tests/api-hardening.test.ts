import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { buildServer } from "../src/api/server.js";
import type { ServerSettings } from "../src/core/config/server-settings.js";
import { createGatewayContext } from "../src/core/services/gateway-context.js";
import { createSilentLogger } from "../src/lib/logger.js";
import {
  FakeIdentityProvider,
  createSigningKey,
  testAuthSettings,
  type TestSigningKey
} from "./support/identity-provider.js";

let signingKey: TestSigningKey;
const openApps: Array<{ close: () => Promise<unknown> }> = [];

beforeAll(() => {
  signingKey = createSigningKey("key-1");
});

afterEach(async () => {
  await Promise.allSettled(openApps.splice(0).map((app) => app.close()));
});

async function createTestServer(overrides?: Partial<ServerSettings>) {
  const idp = new FakeIdentityProvider([signingKey]);
  const app = buildServer(
    createGatewayContext({
      settings: {
        port: 0,
        host: "127.0.0.1",
        corsOrigins: ["*"],
        bodyLimitBytes: 1_048_576,
        logLevel: "silent",
        protectedPrefixes: ["/v1"],
        ...overrides
      },
      authSettings: testAuthSettings(),
      logger: createSilentLogger(),
      fetchFn: idp.fetch
    })
  );
  openApps.push(app);
  await app.ready();
  return { app, idp };
}

describe("API hardening", () => {
  it("applies security response headers", async () => {
    const { app } = await createTestServer();

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["x-content-type-options"]).toBe("nosniff");
    expect(response.headers["x-frame-options"]).toBe("DENY");
    expect(response.headers["cache-control"]).toBe("no-store");
    expect(response.headers["x-xss-protection"]).toBe("0");
    expect(typeof response.headers["x-request-id"]).toBe("string");
  });

  it("echoes a caller-supplied request id", async () => {
    const { app } = await createTestServer();
    const response = await app.inject({ method: "GET", url: "/health", headers: { "x-request-id": "req-fixed" } });
    expect(response.headers["x-request-id"]).toBe("req-fixed");
  });

  it("enforces CORS preflight origin checks when configured", async () => {
    const { app } = await createTestServer({ corsOrigins: ["https://app.example.test"] });

    const allowed = await app.inject({
      method: "OPTIONS",
      url: "/v1/entities",
      headers: { origin: "https://app.example.test", "access-control-request-method": "GET" }
    });
    expect(allowed.statusCode).toBe(204);
    expect(allowed.headers["access-control-allow-origin"]).toBe("https://app.example.test");
    expect(allowed.headers.vary).toBe("Origin");

    const denied = await app.inject({
      method: "OPTIONS",
      url: "/v1/entities",
      headers: { origin: "https://other.example.test", "access-control-request-method": "GET" }
    });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toMatchObject({ error: { code: "cors_forbidden" } });
  });

  it("rejects oversized request bodies", async () => {
    const { app, idp } = await createTestServer({ bodyLimitBytes: 250 });

    const response = await app.inject({
      method: "POST",
      url: "/v1/conversations",
      headers: { authorization: `Bearer ${idp.signToken()}`, "content-type": "application/json" },
      payload: JSON.stringify({ metadata: { blob: "x".repeat(5000) } })
    });

    expect(response.statusCode).toBe(413);
  });

  it("answers unknown routes under a protected prefix only after authentication", async () => {
    const { app, idp } = await createTestServer();

    const anonymous = await app.inject({ method: "GET", url: "/v1/unknown" });
    expect(anonymous.statusCode).toBe(401);

    const authenticated = await app.inject({
      method: "GET",
      url: "/v1/unknown",
      headers: { authorization: `Bearer ${idp.signToken()}` }
    });
    expect(authenticated.statusCode).toBe(404);
  });
});
