import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../../core/services/gateway-context.js";

export function registerPublicRoutes(app: FastifyInstance, context: GatewayContext): void {
  app.get("/health", { config: { allowAnonymous: true } }, async () => {
    const jwks = context.tokenValidator.jwks.status();
    return {
      status: "healthy",
      service: "devui-gateway",
      entitiesCount: context.entities.list().length,
      auth: {
        state: context.tokenValidator.status,
        tenantId: context.authSettings.tenantId,
        issuer: jwks.issuer,
        keyCount: jwks.keyCount,
        keysExpireAt: jwks.expiresAt
      },
      timestamp: new Date().toISOString()
    };
  });
}
