import type { FastifyInstance } from "fastify";
import type { GatewayContext } from "../../core/services/gateway-context.js";
import {
  addItemsSchema,
  conversationItemParamsSchema,
  conversationParamsSchema,
  createConversationSchema,
  listConversationsQuerySchema,
  listItemsQuerySchema,
  updateConversationSchema
} from "../../core/types/schemas.js";
import { HttpError, handleError } from "../http.js";

function conversationNotFound(conversationId: string): HttpError {
  return new HttpError(404, "not_found", `Conversation ${conversationId} not found.`);
}

export function registerConversationRoutes(app: FastifyInstance, context: GatewayContext): void {
  const store = context.conversations;

  app.post("/v1/conversations", async (request, reply) => {
    try {
      const payload = createConversationSchema.parse(request.body ?? {});
      return reply.send(await store.create(payload.metadata));
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.get("/v1/conversations", async (request, reply) => {
    try {
      const query = listConversationsQuerySchema.parse(request.query);
      const conversations = await store.list(query.agent_id ? { agent_id: query.agent_id } : {});
      return reply.send({ object: "list", data: conversations, has_more: false });
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.get("/v1/conversations/:conversationId", async (request, reply) => {
    try {
      const { conversationId } = conversationParamsSchema.parse(request.params);
      const conversation = await store.get(conversationId);
      if (!conversation) {
        throw conversationNotFound(conversationId);
      }
      return reply.send(conversation);
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.post("/v1/conversations/:conversationId", async (request, reply) => {
    try {
      const { conversationId } = conversationParamsSchema.parse(request.params);
      const payload = updateConversationSchema.parse(request.body ?? {});
      const conversation = await store.update(conversationId, payload.metadata);
      if (!conversation) {
        throw conversationNotFound(conversationId);
      }
      return reply.send(conversation);
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.delete("/v1/conversations/:conversationId", async (request, reply) => {
    try {
      const { conversationId } = conversationParamsSchema.parse(request.params);
      const deleted = await store.delete(conversationId);
      if (!deleted) {
        throw conversationNotFound(conversationId);
      }
      return reply.send(deleted);
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.post("/v1/conversations/:conversationId/items", async (request, reply) => {
    try {
      const { conversationId } = conversationParamsSchema.parse(request.params);
      const payload = addItemsSchema.parse(request.body ?? {});
      const items = await store.addItems(conversationId, payload.items);
      if (!items) {
        throw conversationNotFound(conversationId);
      }
      return reply.send({ object: "list", data: items });
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.get("/v1/conversations/:conversationId/items", async (request, reply) => {
    try {
      const { conversationId } = conversationParamsSchema.parse(request.params);
      const query = listItemsQuerySchema.parse(request.query);
      const page = await store.listItems(conversationId, query);
      if (!page) {
        throw conversationNotFound(conversationId);
      }
      return reply.send({ object: "list", data: page.items, has_more: page.hasMore });
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });

  app.get("/v1/conversations/:conversationId/items/:itemId", async (request, reply) => {
    try {
      const { conversationId, itemId } = conversationItemParamsSchema.parse(request.params);
      const item = await store.getItem(conversationId, itemId);
      if (!item) {
        throw new HttpError(404, "not_found", "Item not found.");
      }
      return reply.send(item);
    } catch (error) {
      return handleError(error, reply, request.id);
    }
  });
}
