import { createId } from "../../lib/id.js";
import type {
  ExecutionEvent,
  FunctionCallEvent,
  FunctionResultEvent,
  InputMessage,
  OutputTextDeltaEvent
} from "../types/domain.js";
import type { EntityRunInput, RegisteredEntity } from "./types.js";

export const ECHO_AGENT_ID = "echo_agent";

function lastUserText(messages: InputMessage[]): string {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message?.role === "user") {
      return typeof message.content === "string"
        ? message.content
        : message.content.map((part) => part.text).join("");
    }
  }
  return "";
}

/**
 * Built-in agent that calls a `whoami` tool with the forwarded user context,
 * then echoes the latest user message back word by word.
 */
export function createEchoAgent(): RegisteredEntity {
  return {
    info: {
      id: ECHO_AGENT_ID,
      name: "Echo Agent",
      type: "agent",
      description: "Echoes the latest user message and reports who asked.",
      framework: "devui-gateway",
      source: "in_memory",
      tools: ["whoami"],
      metadata: {}
    },
    async *run({ messages, toolArguments }: EntityRunInput): AsyncGenerator<ExecutionEvent, void, undefined> {
      const callId = createId("call");
      const user = toolArguments.user_context;
      yield {
        type: "response.function_call.complete",
        call_id: callId,
        name: "whoami",
        arguments: "{}"
      } satisfies FunctionCallEvent;
      yield {
        type: "response.function_result.complete",
        call_id: callId,
        output: user?.preferred_username ?? user?.object_id ?? "anonymous",
        status: "completed"
      } satisfies FunctionResultEvent;

      const itemId = createId("msg");
      const words = `Echo: ${lastUserText(messages)}`.split(" ");
      for (const [index, word] of words.entries()) {
        yield {
          type: "response.output_text.delta",
          item_id: itemId,
          output_index: 0,
          delta: index === 0 ? word : ` ${word}`
        } satisfies OutputTextDeltaEvent;
      }
    }
  };
}
