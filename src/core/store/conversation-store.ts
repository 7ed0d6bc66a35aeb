import { createId } from "../../lib/id.js";
import { nowSeconds } from "../../lib/time.js";
import type {
  Conversation,
  ConversationContentPart,
  ConversationDeleted,
  ConversationItem,
  ItemPage,
  ListItemsOptions,
  NewConversationItem
} from "../types/domain.js";

/**
 * Conversation persistence. Every lookup resolves `undefined` when the
 * conversation (or item) does not exist.
 */
export interface ConversationStore {
  create(metadata?: Record<string, string>): Promise<Conversation>;
  /** Conversations whose metadata contains every entry of `filter`, oldest first. */
  list(filter?: Record<string, string>): Promise<Conversation[]>;
  get(conversationId: string): Promise<Conversation | undefined>;
  update(conversationId: string, metadata: Record<string, string>): Promise<Conversation | undefined>;
  delete(conversationId: string): Promise<ConversationDeleted | undefined>;
  addItems(conversationId: string, items: NewConversationItem[]): Promise<ConversationItem[] | undefined>;
  listItems(conversationId: string, options: ListItemsOptions): Promise<ItemPage | undefined>;
  getItem(conversationId: string, itemId: string): Promise<ConversationItem | undefined>;
}

interface ConversationState {
  conversation: Conversation;
  items: ConversationItem[];
}

function normalizeContent(item: NewConversationItem): ConversationContentPart[] {
  if (typeof item.content !== "string") {
    return item.content.map((part) => ({ ...part }));
  }
  return item.role === "assistant"
    ? [{ type: "output_text", text: item.content, annotations: [] }]
    : [{ type: "input_text", text: item.content }];
}

function matches(metadata: Record<string, string>, filter: Record<string, string>): boolean {
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, ConversationState>();

  async create(metadata: Record<string, string> = {}): Promise<Conversation> {
    const conversation: Conversation = {
      id: createId("conv"),
      object: "conversation",
      created_at: nowSeconds(),
      metadata: { ...metadata }
    };
    this.conversations.set(conversation.id, { conversation, items: [] });
    return { ...conversation, metadata: { ...conversation.metadata } };
  }

  async list(filter: Record<string, string> = {}): Promise<Conversation[]> {
    return [...this.conversations.values()]
      .map((state) => state.conversation)
      .filter((conversation) => matches(conversation.metadata, filter))
      .map((conversation) => ({ ...conversation, metadata: { ...conversation.metadata } }));
  }

  async get(conversationId: string): Promise<Conversation | undefined> {
    const state = this.conversations.get(conversationId);
    return state ? { ...state.conversation, metadata: { ...state.conversation.metadata } } : undefined;
  }

  async update(conversationId: string, metadata: Record<string, string>): Promise<Conversation | undefined> {
    const state = this.conversations.get(conversationId);
    if (!state) {
      return undefined;
    }
    state.conversation = { ...state.conversation, metadata: { ...metadata } };
    return { ...state.conversation, metadata: { ...state.conversation.metadata } };
  }

  async delete(conversationId: string): Promise<ConversationDeleted | undefined> {
    if (!this.conversations.delete(conversationId)) {
      return undefined;
    }
    return { id: conversationId, object: "conversation.deleted", deleted: true };
  }

  async addItems(conversationId: string, items: NewConversationItem[]): Promise<ConversationItem[] | undefined> {
    const state = this.conversations.get(conversationId);
    if (!state) {
      return undefined;
    }
    const createdAt = nowSeconds();
    const added = items.map(
      (item): ConversationItem => ({
        id: createId("msg"),
        type: "message",
        role: item.role,
        status: "completed",
        content: normalizeContent(item),
        created_at: createdAt
      })
    );
    state.items.push(...added);
    return added;
  }

  /**
   * One page of items. `after` is the id of the last item of the previous
   * page; a cursor that names no item yields an empty page.
   */
  async listItems(conversationId: string, options: ListItemsOptions): Promise<ItemPage | undefined> {
    const state = this.conversations.get(conversationId);
    if (!state) {
      return undefined;
    }
    const ordered = options.order === "desc" ? [...state.items].reverse() : state.items;
    let start = 0;
    if (options.after !== undefined) {
      const cursor = ordered.findIndex((item) => item.id === options.after);
      if (cursor < 0) {
        return { items: [], hasMore: false };
      }
      start = cursor + 1;
    }
    const items = ordered.slice(start, start + options.limit);
    return { items, hasMore: start + options.limit < ordered.length };
  }

  async getItem(conversationId: string, itemId: string): Promise<ConversationItem | undefined> {
    return this.conversations.get(conversationId)?.items.find((item) => item.id === itemId);
  }
}
