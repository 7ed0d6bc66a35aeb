import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../../core/services/gateway-context.js";
import { entityParamsSchema } from "../../core/types/schemas.js";
import { HttpError, handleError } from "../http.js";

export function registerEntityRoutes(app: FastifyInstance, context: GatewayContext): void {
  app.get("/v1/entities", async () => ({
    entities: context.entities.list()
  }));

  app.get("/v1/entities/:entityId/info", async (request, reply) => {
    try {
      const { entityId } = entityParamsSchema.parse(request.params);
      const info = context.entities.get(entityId);
      if (!info) {
        throw new HttpError(404, "not_found", `Entity ${entityId} not found.`);
      }
      return reply.send(info);
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.delete("/v1/entities/:entityId", async (request, reply) => {
    try {
      const { entityId } = entityParamsSchema.parse(request.params);
      const removed = await context.entities.remove(entityId);
      if (!removed) {
        throw new HttpError(404, "not_found", "Entity not found or cannot be removed.");
      }
      request.log.info({ entityId }, "Removed entity");
      return reply.send({ success: true });
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });
}
