import { Readable } from "node:stream";
import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../../core/services/gateway-context.js";
import type { ExecutionRequest } from "../../core/types/domain.js";
import { createResponseSchema } from "../../core/types/schemas.js";
import { HttpError, handleError } from "../http.js";

export function registerResponseRoutes(app: FastifyInstance, context: GatewayContext): void {
  app.post("/v1/responses", async (request, reply) => {
    try {
      const payload = createResponseSchema.parse(request.body);
      const entityId = payload.extra_body?.entity_id ?? payload.metadata?.entity_id;
      if (!entityId) {
        throw new HttpError(
          400,
          "missing_entity_id",
          "Missing entity_id. Provide it as extra_body.entity_id or metadata.entity_id."
        );
      }
      if (!context.entities.get(entityId)) {
        throw new HttpError(404, "entity_not_found", `Entity not found: ${entityId}`);
      }

      const conversationId = typeof payload.conversation === "string" ? payload.conversation : payload.conversation?.id;
      if (conversationId && !(await context.conversations.get(conversationId))) {
        throw new HttpError(404, "conversation_not_found", `Conversation not found: ${conversationId}`);
      }

      const executionRequest: ExecutionRequest = {
        entityId,
        model: payload.model,
        input: payload.input,
        conversationId,
        metadata: payload.metadata
      };
      const { executionContext, executionEngine } = context;
      const principal = request.auth?.principal;
      const token = request.auth?.token;
      request.log.info({ entityId, stream: payload.stream === true }, "Executing response request");

      if (payload.stream !== true) {
        const response = await executionContext.withContext(principal, token, () =>
          executionEngine.executeSync(executionRequest)
        );
        return reply.send(response);
      }

      const disconnect = new AbortController();
      reply.raw.on("close", () => disconnect.abort());

      const events = executionContext.withContext(principal, token, () =>
        executionContext.bindIterable(executionEngine.executeStreaming(executionRequest))
      );
      const frames = context.streamingAggregator.stream(events, {
        signal: disconnect.signal,
        aggregate: (collected) => executionEngine.aggregateToResponse(collected, executionRequest)
      });

      reply.header("content-type", "text/event-stream; charset=utf-8");
      reply.header("cache-control", "no-cache");
      reply.header("connection", "keep-alive");
      return reply.send(Readable.from(frames));
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });
}
