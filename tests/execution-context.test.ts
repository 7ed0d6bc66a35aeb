import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { ExecutionContextPropagator } from "../src/core/services/execution-context.js";
import { testPrincipal } from "./support/identity-provider.js";

describe("ExecutionContextPropagator", () => {
  it("is empty outside any request", () => {
    const propagator = new ExecutionContextPropagator();
    expect(propagator.currentPrincipal()).toBeUndefined();
    expect(propagator.currentAccessToken()).toBeUndefined();
    expect(propagator.userIdentifier()).toBeUndefined();
    expect(propagator.toToolArguments()).toEqual({});
    expect(propagator.toMetadata()).toEqual({});
  });

  it("exposes principal and token inside withContext and restores afterwards", () => {
    const propagator = new ExecutionContextPropagator();
    const principal = testPrincipal();

    const seen = propagator.withContext(principal, "test-token", () => ({
      principal: propagator.currentPrincipal(),
      token: propagator.currentAccessToken(),
      user: propagator.userIdentifier()
    }));

    expect(seen).toEqual({ principal, token: "test-token", user: "user@example.test" });
    expect(propagator.currentPrincipal()).toBeUndefined();
  });

  it("restores the previous context when the body throws", () => {
    const propagator = new ExecutionContextPropagator();
    const outer = testPrincipal({ objectId: "outer" });

    propagator.withContext(outer, "outer-token", () => {
      expect(() =>
        propagator.withContext(testPrincipal({ objectId: "inner" }), "inner-token", () => {
          throw new Error("boom");
        })
      ).toThrow("boom");
      expect(propagator.currentPrincipal()?.objectId).toBe("outer");
      expect(propagator.currentAccessToken()).toBe("outer-token");
    });
  });

  it("keeps the context across awaits and restores it after an async fault", async () => {
    const propagator = new ExecutionContextPropagator();

    const token = await propagator.withContext(testPrincipal(), "test-token", async () => {
      await delay(1);
      return propagator.currentAccessToken();
    });
    expect(token).toBe("test-token");

    await expect(
      propagator.withContext(testPrincipal(), "test-token", async () => {
        await delay(1);
        throw new Error("late failure");
      })
    ).rejects.toThrow("late failure");
    expect(propagator.currentAccessToken()).toBeUndefined();
  });

  it("isolates concurrent requests", async () => {
    const propagator = new ExecutionContextPropagator();
    const run = (objectId: string, pause: number) =>
      propagator.withContext(testPrincipal({ objectId, preferredUsername: undefined }), `${objectId}-token`, async () => {
        const before = propagator.userIdentifier();
        await delay(pause);
        return [before, propagator.userIdentifier(), propagator.currentAccessToken()];
      });

    const [alice, bob] = await Promise.all([run("alice", 15), run("bob", 1)]);

    expect(alice).toEqual(["alice", "alice", "alice-token"]);
    expect(bob).toEqual(["bob", "bob", "bob-token"]);
  });

  it("builds tool arguments with only the values present", () => {
    const propagator = new ExecutionContextPropagator();
    const principal = testPrincipal({ name: undefined });

    const args = propagator.withContext(principal, "test-token", () => propagator.toToolArguments());
    expect(args).toEqual({
      user_context: {
        object_id: "user-123",
        tenant_id: "test-tenant",
        preferred_username: "user@example.test",
        roles: ["DevUI.Admin"],
        scopes: ["DevUI.Read"],
        claims: { oid: "user-123", tid: "test-tenant" }
      },
      user_access_token: "test-token"
    });
    expect(args.user_context && "name" in args.user_context).toBe(false);

    const tokenOnly = propagator.withContext(undefined, "test-token", () => propagator.toToolArguments());
    expect(tokenOnly).toEqual({ user_access_token: "test-token" });
  });

  it("exposes the user context only inside a request", () => {
    const propagator = new ExecutionContextPropagator();
    expect(propagator.currentUserContext()).toBeUndefined();

    const userContext = propagator.withContext(testPrincipal(), "test-token", () => propagator.currentUserContext());
    expect(userContext).toEqual({
      object_id: "user-123",
      tenant_id: "test-tenant",
      name: "Test User",
      preferred_username: "user@example.test",
      roles: ["DevUI.Admin"],
      scopes: ["DevUI.Read"],
      claims: { oid: "user-123", tid: "test-tenant" }
    });

    expect(propagator.withContext(undefined, "test-token", () => propagator.currentUserContext())).toBeUndefined();
    expect(propagator.currentUserContext()).toBeUndefined();
  });

  it("builds metadata without claims or token", () => {
    const propagator = new ExecutionContextPropagator();
    const metadata = propagator.withContext(testPrincipal(), "test-token", () => propagator.toMetadata());
    expect(metadata).toEqual({
      user_object_id: "user-123",
      user_tenant_id: "test-tenant",
      user_roles: ["DevUI.Admin"],
      user_scopes: ["DevUI.Read"],
      user_name: "Test User",
      user_principal_name: "user@example.test"
    });
  });

  it("binds a lazily pulled stream to the context it was created in", async () => {
    const propagator = new ExecutionContextPropagator();
    async function* identities() {
      yield propagator.userIdentifier();
      await delay(1);
      yield propagator.userIdentifier();
    }

    const bound = propagator.withContext(testPrincipal(), "test-token", () => propagator.bindIterable(identities()));
    const seen: Array<string | undefined> = [];
    for await (const identity of bound) {
      seen.push(identity);
    }

    expect(seen).toEqual(["user@example.test", "user@example.test"]);
    expect(propagator.userIdentifier()).toBeUndefined();
  });
});
