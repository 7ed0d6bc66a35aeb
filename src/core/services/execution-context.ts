import { AsyncLocalStorage } from "node:async_hooks";
import type { AuthenticatedPrincipal } from "../types/auth.js";

export interface ExecutionContext {
  readonly principal?: AuthenticatedPrincipal | undefined;
  readonly accessToken?: string | undefined;
}

export interface UserContext {
  object_id: string;
  tenant_id: string;
  name?: string;
  preferred_username?: string;
  roles: string[];
  scopes: string[];
  claims: Record<string, unknown>;
}

export interface ToolArguments {
  user_context?: UserContext;
  user_access_token?: string;
}

export type ContextMetadata = Record<string, string | string[]>;

const EMPTY_CONTEXT: ExecutionContext = Object.freeze({});

function userContextOf(principal: AuthenticatedPrincipal): UserContext {
  const userContext: UserContext = {
    object_id: principal.objectId,
    tenant_id: principal.tenantId,
    roles: [...principal.roles],
    scopes: [...principal.scopes],
    claims: { ...principal.claims }
  };
  if (principal.name) {
    userContext.name = principal.name;
  }
  if (principal.preferredUsername) {
    userContext.preferred_username = principal.preferredUsername;
  }
  return userContext;
}

/**
 * Carries the authenticated principal and its raw access token through the
 * asynchronous extent of one request. Every request runs in its own async
 * context, so concurrent requests never observe each other's principal.
 */
export class ExecutionContextPropagator {
  private readonly storage = new AsyncLocalStorage<ExecutionContext>();

  /**
   * Run `body` with the given principal and token installed. The previous
   * context is back in place once `body` returns or throws; promises created
   * inside keep the installed context until they settle.
   */
  withContext<T>(
    principal: AuthenticatedPrincipal | null | undefined,
    accessToken: string | null | undefined,
    body: () => T
  ): T {
    const context: ExecutionContext = Object.freeze({
      principal: principal ?? undefined,
      accessToken: accessToken ?? undefined
    });
    return this.storage.run(context, body);
  }

  currentContext(): ExecutionContext {
    return this.storage.getStore() ?? EMPTY_CONTEXT;
  }

  currentPrincipal(): AuthenticatedPrincipal | undefined {
    return this.currentContext().principal;
  }

  currentAccessToken(): string | undefined {
    return this.currentContext().accessToken;
  }

  /** Stable attribution key: preferred username, else object id. */
  userIdentifier(): string | undefined {
    const principal = this.currentPrincipal();
    if (!principal) {
      return undefined;
    }
    return principal.preferredUsername ?? principal.objectId;
  }

  currentUserContext(): UserContext | undefined {
    const principal = this.currentPrincipal();
    return principal ? userContextOf(principal) : undefined;
  }

  toToolArguments(): ToolArguments {
    const { principal, accessToken } = this.currentContext();
    const args: ToolArguments = {};
    if (principal) {
      args.user_context = userContextOf(principal);
    }
    if (accessToken) {
      args.user_access_token = accessToken;
    }
    return args;
  }

  /** Identity fields safe to hand to model providers. Never includes claims or the token. */
  toMetadata(): ContextMetadata {
    const principal = this.currentPrincipal();
    if (!principal) {
      return {};
    }
    const metadata: ContextMetadata = {
      user_object_id: principal.objectId,
      user_tenant_id: principal.tenantId,
      user_roles: [...principal.roles],
      user_scopes: [...principal.scopes]
    };
    if (principal.name) {
      metadata.user_name = principal.name;
    }
    if (principal.preferredUsername) {
      metadata.user_principal_name = principal.preferredUsername;
    }
    return metadata;
  }

  /**
   * Wrap an async iterable so each pull runs in the context that was current
   * when `bindIterable` was called, wherever the consumer happens to pull from.
   */
  bindIterable<T>(iterable: AsyncIterable<T>): AsyncIterable<T> {
    const captured = this.currentContext();
    const enter = <R>(body: () => R): R => this.storage.run(captured, body);

    return {
      [Symbol.asyncIterator]: (): AsyncIterator<T> => {
        const iterator = enter(() => iterable[Symbol.asyncIterator]());
        return {
          next: () => enter(() => iterator.next()),
          return: async (): Promise<IteratorResult<T>> => {
            if (typeof iterator.return === "function") {
              const close = iterator.return.bind(iterator);
              return enter(() => close());
            }
            return { done: true, value: undefined };
          }
        };
      }
    };
  }
}

/** Process-wide default; the gateway context may supply its own instance. */
export const executionContext = new ExecutionContextPropagator();
