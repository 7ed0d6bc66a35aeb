import type { ContextMetadata, ToolArguments } from "../services/execution-context.js";
import type { EntityInfo, ExecutionEvent, ExecutionRequest, InputMessage } from "../types/domain.js";

export interface EntityRunInput {
  request: ExecutionRequest;
  /** Conversation history followed by the new input, oldest first. */
  messages: InputMessage[];
  toolArguments: ToolArguments;
  metadata: ContextMetadata;
}

export interface RegisteredEntity {
  readonly info: EntityInfo;
  run(input: EntityRunInput): AsyncIterable<ExecutionEvent>;
  /** Releases clients the entity holds. Called on removal and shutdown. */
  close?(): Promise<void> | void;
}
