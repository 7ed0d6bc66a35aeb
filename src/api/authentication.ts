import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { TokenValidator } from "../core/services/token-validator.js";
import type { RequestAuth } from "../core/types/auth.js";
import { authHeaderFromHeaders, errorBody, parseBearerToken } from "./http.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the authentication hook on protected routes; `null` elsewhere. */
    auth: RequestAuth | null;
  }

  interface FastifyContextConfig {
    allowAnonymous?: boolean | undefined;
  }
}

/** Routes declared `allowAnonymous`, keyed by method and route pattern. */
export class RouteAccessTable {
  private readonly anonymous = new Set<string>();

  allowAnonymous(method: string, url: string): void {
    this.anonymous.add(`${method.toUpperCase()} ${url}`);
  }

  isAnonymous(method: string, url: string | undefined): boolean {
    return url !== undefined && this.anonymous.has(`${method.toUpperCase()} ${url}`);
  }

  entries(): string[] {
    return [...this.anonymous].sort();
  }
}

export function isProtectedPath(path: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => path === prefix || path.startsWith(`${prefix}/`));
}

function pathOf(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart < 0 ? url : url.slice(0, queryStart);
}

/** Decoded request path, or `null` when the escapes are malformed. */
function decodedPathOf(url: string): string | null {
  try {
    return decodeURIComponent(pathOf(url));
  } catch {
    return null;
  }
}

/**
 * Protection follows the route the router matched, so percent-encoded
 * spellings of a protected path stay protected. Unmatched paths are judged
 * decoded; undecodable ones are protected.
 */
function requiresAuthentication(request: FastifyRequest, prefixes: readonly string[]): boolean {
  const path = request.routeOptions.url ?? decodedPathOf(request.url);
  return path === null || isProtectedPath(path, prefixes);
}

export interface AuthenticationOptions {
  validator: TokenValidator;
  protectedPrefixes: readonly string[];
  routeAccess?: RouteAccessTable | undefined;
}

function reject(request: FastifyRequest, reply: FastifyReply, statusCode: number, code: string, message: string) {
  request.log.warn({ statusCode, code, path: pathOf(request.url) }, "Rejected request");
  if (statusCode === 401) {
    reply.header("www-authenticate", "Bearer");
  }
  return reply.status(statusCode).send(errorBody(code, message, request.id));
}

/**
 * Bearer authentication for every route under a protected prefix. Must be
 * registered before the routes so the route-access table sees them.
 */
export function registerAuthentication(app: FastifyInstance, options: AuthenticationOptions): RouteAccessTable {
  const routeAccess = options.routeAccess ?? new RouteAccessTable();

  app.decorateRequest("auth", null);

  app.addHook("onRoute", (route) => {
    if (route.config?.allowAnonymous !== true) {
      return;
    }
    const methods = Array.isArray(route.method) ? route.method : [route.method];
    for (const method of methods) {
      routeAccess.allowAnonymous(method, route.url);
    }
  });

  app.addHook("onRequest", async (request, reply) => {
    if (request.method === "OPTIONS") {
      return;
    }
    if (routeAccess.isAnonymous(request.method, request.routeOptions.url)) {
      return;
    }
    if (!requiresAuthentication(request, options.protectedPrefixes)) {
      return;
    }

    const bearer = parseBearerToken(authHeaderFromHeaders(request.headers));
    if (!bearer.ok) {
      return reject(request, reply, 401, bearer.code, bearer.message);
    }

    const result = await options.validator.validate(bearer.token);
    if (!result.ok) {
      const { error } = result;
      if (error.kind === "configuration") {
        request.log.error({ code: error.code, err: error }, "Token validation unavailable");
        return reject(request, reply, error.statusCode, error.code, "Server authentication is misconfigured.");
      }
      return reject(request, reply, error.statusCode, error.code, error.message);
    }

    request.auth = { principal: result.principal, token: bearer.token };
  });

  return routeAccess;
}
