import { z } from "zod";
import { createId } from "../../lib/id.js";
import type { Logger } from "../../lib/logger.js";
import { createSilentLogger } from "../../lib/logger.js";
import { nowSeconds } from "../../lib/time.js";
import type { EntityDiscovery } from "../entities/registry.js";
import { StreamingFault } from "../errors.js";
import type { ConversationStore } from "../store/conversation-store.js";
import type {
  ConversationItem,
  ExecutionEvent,
  ExecutionRequest,
  InputMessage,
  NewConversationItem,
  ResponseObject,
  ResponseOutputItem
} from "../types/domain.js";
import type { ExecutionContextPropagator } from "./execution-context.js";

export interface ExecutionEngine {
  executeSync(request: ExecutionRequest): Promise<ResponseObject>;
  executeStreaming(request: ExecutionRequest): AsyncIterable<ExecutionEvent>;
  aggregateToResponse(events: readonly ExecutionEvent[], request: ExecutionRequest): ResponseObject;
}

const HISTORY_LIMIT = 1000;

const textDeltaSchema = z.object({
  type: z.literal("response.output_text.delta"),
  item_id: z.string(),
  delta: z.string()
});

const functionCallSchema = z.object({
  type: z.literal("response.function_call.complete"),
  call_id: z.string(),
  name: z.string(),
  arguments: z.string()
});

const functionResultSchema = z.object({
  type: z.literal("response.function_result.complete"),
  call_id: z.string(),
  output: z.string()
});

const errorEventSchema = z.object({
  type: z.literal("error"),
  message: z.string(),
  code: z.string().optional()
});

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

function messageText(message: InputMessage): string {
  return typeof message.content === "string"
    ? message.content
    : message.content.map((part) => part.text).join("");
}

function toInputMessages(input: ExecutionRequest["input"]): InputMessage[] {
  return typeof input === "string" ? [{ type: "message", role: "user", content: input }] : input;
}

function historyMessage(item: ConversationItem): InputMessage {
  return {
    type: "message",
    role: item.role,
    content: item.content.map((part) => part.text).join("")
  };
}

/**
 * Runs registered entities for response requests. The caller is expected to
 * have installed the request's execution context; the engine reads principal
 * and token from it and hands them to the entity as tool arguments.
 */
export class LocalExecutionEngine implements ExecutionEngine {
  constructor(
    private readonly entities: EntityDiscovery,
    private readonly conversations: ConversationStore,
    private readonly context: ExecutionContextPropagator,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  async executeSync(request: ExecutionRequest): Promise<ResponseObject> {
    const events: ExecutionEvent[] = [];
    for await (const event of this.executeStreaming(request)) {
      events.push(event);
    }
    return this.aggregateToResponse(events, request);
  }

  async *executeStreaming(request: ExecutionRequest): AsyncGenerator<ExecutionEvent, void, undefined> {
    const entity = this.entities.getRunnable(request.entityId);
    if (!entity) {
      throw new StreamingFault(`Entity not found: ${request.entityId}`);
    }

    const input = toInputMessages(request.input);
    const history = await this.loadHistory(request.conversationId);
    const toolArguments = this.context.toToolArguments();
    this.logger.info(
      { entityId: request.entityId, user: this.context.userIdentifier() ?? null, historyItems: history.length },
      "Executing entity"
    );

    let outputText = "";
    for await (const event of entity.run({
      request,
      messages: [...history, ...input],
      toolArguments,
      metadata: this.context.toMetadata()
    })) {
      const delta = textDeltaSchema.safeParse(event);
      if (delta.success) {
        outputText += delta.data.delta;
      }
      yield event;
    }

    if (request.conversationId) {
      const items: NewConversationItem[] = input.map((message) => ({ role: message.role, content: messageText(message) }));
      if (outputText.length > 0) {
        items.push({ role: "assistant", content: outputText });
      }
      await this.conversations.addItems(request.conversationId, items);
    }
  }

  aggregateToResponse(events: readonly ExecutionEvent[], request: ExecutionRequest): ResponseObject {
    const output: ResponseOutputItem[] = [];
    // Deltas for one item id fold into a single message, placed where its first delta arrived.
    const textByItemId = new Map<string, string>();
    let error: ResponseObject["error"] = null;
    let outputWords = 0;

    for (const event of events) {
      const delta = textDeltaSchema.safeParse(event);
      if (delta.success) {
        const previous = textByItemId.get(delta.data.item_id);
        if (previous === undefined) {
          output.push({ type: "message", id: delta.data.item_id, role: "assistant", status: "completed", content: [] });
        }
        textByItemId.set(delta.data.item_id, (previous ?? "") + delta.data.delta);
        continue;
      }

      const call = functionCallSchema.safeParse(event);
      if (call.success) {
        output.push({
          type: "function_call",
          id: createId("fc"),
          call_id: call.data.call_id,
          name: call.data.name,
          arguments: call.data.arguments,
          status: "completed"
        });
        continue;
      }

      const result = functionResultSchema.safeParse(event);
      if (result.success) {
        output.push({
          type: "function_call_output",
          id: createId("fco"),
          call_id: result.data.call_id,
          output: result.data.output
        });
        continue;
      }

      const failure = errorEventSchema.safeParse(event);
      if (failure.success) {
        error = { code: failure.data.code ?? "execution_error", message: failure.data.message };
      }
    }

    for (const item of output) {
      if (item.type === "message") {
        const text = textByItemId.get(item.id) ?? "";
        item.content = [{ type: "output_text", text, annotations: [] }];
        outputWords += countWords(text);
      }
    }

    const inputWords = toInputMessages(request.input).reduce((total, message) => total + countWords(messageText(message)), 0);

    return {
      id: createId("resp"),
      object: "response",
      created_at: nowSeconds(),
      model: request.model,
      status: error ? "failed" : "completed",
      output,
      usage: {
        input_tokens: inputWords,
        output_tokens: outputWords,
        total_tokens: inputWords + outputWords
      },
      error,
      metadata: { ...request.metadata }
    };
  }

  private async loadHistory(conversationId: string | undefined): Promise<InputMessage[]> {
    if (!conversationId) {
      return [];
    }
    const page = await this.conversations.listItems(conversationId, { limit: HISTORY_LIMIT, order: "asc" });
    if (!page) {
      throw new StreamingFault(`Conversation not found: ${conversationId}`);
    }
    return page.items.map(historyMessage);
  }
}
