export type EntityType = "agent" | "workflow";

export type EntitySource = "directory" | "in_memory" | "remote";

export interface EntityInfo {
  id: string;
  name: string;
  type: EntityType;
  description?: string | undefined;
  framework: string;
  source: EntitySource;
  tools?: string[] | undefined;
  input_schema?: Record<string, unknown> | undefined;
  metadata: Record<string, unknown>;
}

/**
 * One event emitted by the execution engine. Only `type` is interpreted by
 * the gateway; every other field is forwarded as-is.
 */
export interface ExecutionEvent {
  type: string;
  [field: string]: unknown;
}

export interface OutputTextDeltaEvent extends ExecutionEvent {
  type: "response.output_text.delta";
  item_id: string;
  output_index: number;
  delta: string;
}

export interface FunctionCallEvent extends ExecutionEvent {
  type: "response.function_call.complete";
  call_id: string;
  name: string;
  arguments: string;
}

export interface FunctionResultEvent extends ExecutionEvent {
  type: "response.function_result.complete";
  call_id: string;
  output: string;
  status: "completed" | "failed";
}

export interface InputTextPart {
  type: "input_text";
  text: string;
}

export interface OutputTextPart {
  type: "output_text";
  text: string;
  annotations: unknown[];
}

export type MessageRole = "user" | "assistant" | "system" | "developer";

export interface InputMessage {
  type: "message";
  role: MessageRole;
  content: string | InputTextPart[];
}

export interface ExecutionRequest {
  entityId: string;
  model: string;
  input: string | InputMessage[];
  conversationId?: string | undefined;
  metadata?: Record<string, string> | undefined;
}

export interface ResponseOutputMessage {
  type: "message";
  id: string;
  role: "assistant";
  status: "completed";
  content: OutputTextPart[];
}

export interface ResponseFunctionCall {
  type: "function_call";
  id: string;
  call_id: string;
  name: string;
  arguments: string;
  status: "completed";
}

export interface ResponseFunctionCallOutput {
  type: "function_call_output";
  id: string;
  call_id: string;
  output: string;
}

export type ResponseOutputItem = ResponseOutputMessage | ResponseFunctionCall | ResponseFunctionCallOutput;

export interface ResponseUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface ResponseObject {
  id: string;
  object: "response";
  created_at: number;
  model: string;
  status: "completed" | "failed";
  output: ResponseOutputItem[];
  usage: ResponseUsage;
  error: { code: string; message: string } | null;
  metadata: Record<string, string>;
}

export interface ResponseCompletedEvent extends ExecutionEvent {
  type: "response.completed";
  response: ResponseObject;
  sequence_number: number;
}

export interface Conversation {
  id: string;
  object: "conversation";
  created_at: number;
  metadata: Record<string, string>;
}

export interface ConversationDeleted {
  id: string;
  object: "conversation.deleted";
  deleted: true;
}

export type ConversationContentPart = InputTextPart | OutputTextPart;

export interface ConversationItem {
  id: string;
  type: "message";
  role: MessageRole;
  status: "completed";
  content: ConversationContentPart[];
  created_at: number;
}

export interface NewConversationItem {
  role: MessageRole;
  content: string | ConversationContentPart[];
}

export interface ListItemsOptions {
  limit: number;
  after?: string | undefined;
  order: "asc" | "desc";
}

export interface ItemPage {
  items: ConversationItem[];
  hasMore: boolean;
}
