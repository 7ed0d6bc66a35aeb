import { z } from "zod";

const metadataSchema = z.record(z.string(), z.string());

const messageRoleSchema = z.enum(["user", "assistant", "system", "developer"]);

const inputTextPartSchema = z.object({
  type: z.literal("input_text"),
  text: z.string()
});

const outputTextPartSchema = z.object({
  type: z.literal("output_text"),
  text: z.string(),
  annotations: z.array(z.unknown()).default([])
});

const inputMessageSchema = z.object({
  type: z.literal("message").default("message"),
  role: messageRoleSchema,
  content: z.union([z.string(), z.array(inputTextPartSchema)])
});

export const createResponseSchema = z.object({
  model: z.string().min(1),
  input: z.union([z.string(), z.array(inputMessageSchema).min(1)]),
  stream: z.boolean().optional(),
  // Accepts the bare id or the `{ id }` object form.
  conversation: z.union([z.string().min(1), z.object({ id: z.string().min(1) })]).optional(),
  extra_body: z
    .object({
      entity_id: z.string().min(1).optional()
    })
    .passthrough()
    .optional(),
  metadata: metadataSchema.optional()
});

export const createConversationSchema = z.object({
  metadata: metadataSchema.optional()
});

export const updateConversationSchema = z.object({
  metadata: metadataSchema.default({})
});

export const listConversationsQuerySchema = z.object({
  agent_id: z.string().min(1).optional()
});

export const conversationItemSchema = z.object({
  type: z.literal("message").default("message"),
  role: messageRoleSchema,
  content: z.union([z.string(), z.array(z.union([inputTextPartSchema, outputTextPartSchema]))])
});

export const addItemsSchema = z.object({
  items: z.array(conversationItemSchema).default([])
});

export const listItemsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(100),
  after: z.string().min(1).optional(),
  order: z.enum(["asc", "desc"]).default("asc")
});

export const conversationParamsSchema = z.object({
  conversationId: z.string().min(1)
});

export const conversationItemParamsSchema = conversationParamsSchema.extend({
  itemId: z.string().min(1)
});

export const entityParamsSchema = z.object({
  entityId: z.string().min(1)
});
