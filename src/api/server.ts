import Fastify from "fastify";
import { ZodError } from "zod";
import { isGatewayError } from "../core/errors.js";
import { createGatewayContext, type GatewayContext } from "../core/services/gateway-context.js";
import { registerAuthentication, type RouteAccessTable } from "./authentication.js";
import { HttpError, handleError, requestIdFromHeaders } from "./http.js";
import { registerConversationRoutes } from "./routes/conversations.js";
import { registerEntityRoutes } from "./routes/entities.js";
import { registerPublicRoutes } from "./routes/public.js";
import { registerResponseRoutes } from "./routes/responses.js";

declare module "fastify" {
  interface FastifyInstance {
    routeAccess: RouteAccessTable;
  }
}

export function buildServer(context: GatewayContext = createGatewayContext()) {
  const { settings } = context;

  const app = Fastify({
    loggerInstance: context.logger,
    bodyLimit: settings.bodyLimitBytes,
    genReqId: (request) => requestIdFromHeaders(request.headers)
  });

  // Security response headers
  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
    reply.header("x-content-type-options", "nosniff");
    reply.header("x-frame-options", "DENY");
    reply.header("cache-control", "no-store");
    reply.header("x-xss-protection", "0");
  });

  // CORS
  const allowAll = settings.corsOrigins.includes("*");
  app.addHook("onRequest", async (request, reply) => {
    const origin = request.headers.origin;
    const allowed = origin !== undefined && (allowAll || settings.corsOrigins.includes(origin));
    if (origin !== undefined && allowed) {
      reply.header("access-control-allow-origin", allowAll ? "*" : origin);
      reply.header("access-control-allow-methods", "GET, POST, DELETE, OPTIONS");
      reply.header("access-control-allow-headers", "Authorization, Content-Type, X-Request-Id, Last-Event-ID");
      reply.header("access-control-max-age", "86400");
      if (!allowAll) {
        reply.header("vary", "Origin");
      }
    }
    if (request.method === "OPTIONS") {
      if (origin !== undefined && origin.trim().length > 0 && !allowed) {
        return reply.status(403).send({
          error: {
            code: "cors_forbidden",
            message: "Origin is not allowed.",
            requestId: request.id
          }
        });
      }
      return reply.status(204).send();
    }
  });

  const routeAccess = registerAuthentication(app, {
    validator: context.tokenValidator,
    protectedPrefixes: settings.protectedPrefixes
  });
  app.decorate("routeAccess", routeAccess);

  // Fail closed: listen() rejects when signing material cannot be loaded.
  app.addHook("onReady", async () => {
    await context.tokenValidator.initialize();
  });

  app.addHook("onClose", async () => {
    const closed = await context.entities.closeAll();
    if (closed > 0) {
      app.log.info({ closed }, "Closed entity clients");
    }
  });

  registerPublicRoutes(app, context);
  registerEntityRoutes(app, context);
  registerResponseRoutes(app, context);
  registerConversationRoutes(app, context);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError || error instanceof HttpError || isGatewayError(error)) {
      request.log.warn({ err: error }, "Request failed");
    } else {
      request.log.error({ err: error }, "Unhandled request error");
    }
    return handleError(error, reply, request.id);
  });

  return app;
}

export type { GatewayContext };
