/**
 * Conversions between Tessera's model types and the OpenAI chat wire format.
 *
 * @module @tessera/azure-openai/mappers
 */

import type {
  ChatMessage,
  FinishReason,
  ToolExecutionRequest,
  ToolSpecification,
  TokenUsage,
} from "@tessera/core";
import { tokenUsage } from "@tessera/core";
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionNamedToolChoice,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { CompletionUsage } from "openai/resources/completions";

// =============================================================================
// Messages
// =============================================================================

export function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.type) {
    case "system":
      return { role: "system", content: message.text };

    case "user":
      return message.name === undefined
        ? { role: "user", content: message.text }
        : { role: "user", content: message.text, name: message.name };

    case "ai": {
      const requests = message.toolExecutionRequests ?? [];
      if (requests.length === 0) {
        return { role: "assistant", content: message.text ?? "" };
      }
      return {
        role: "assistant",
        content: message.text ?? null,
        tool_calls: requests.map(toOpenAiToolCall),
      };
    }

    case "tool_execution_result":
      return { role: "tool", tool_call_id: message.id ?? "", content: message.text };
  }
}

export function toOpenAiMessages(messages: readonly ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map(toOpenAiMessage);
}

function toOpenAiToolCall(request: ToolExecutionRequest): ChatCompletionMessageToolCall {
  return {
    id: request.id ?? "",
    type: "function",
    function: { name: request.name, arguments: request.arguments },
  };
}

// =============================================================================
// Tools
// =============================================================================

export function toOpenAiTool(toolSpecification: ToolSpecification): ChatCompletionTool {
  const parameters = toolSpecification.parameters;
  return {
    type: "function",
    function: {
      name: toolSpecification.name,
      description: toolSpecification.description,
      parameters: parameters
        ? { type: parameters.type, properties: parameters.properties, required: parameters.required }
        : { type: "object", properties: {} },
    },
  };
}

export function toOpenAiTools(toolSpecifications: readonly ToolSpecification[]): ChatCompletionTool[] {
  return toolSpecifications.map(toOpenAiTool);
}

/**
 * `tool_choice` that forces a call to the named function.
 */
export function toToolChoice(toolSpecification: ToolSpecification): ChatCompletionNamedToolChoice {
  return { type: "function", function: { name: toolSpecification.name } };
}

// =============================================================================
// Response
// =============================================================================

export function finishReasonFrom(reason: string | null | undefined): FinishReason | undefined {
  switch (reason) {
    case "stop":
      return "stop";
    case "length":
      return "length";
    case "tool_calls":
    case "function_call":
      return "tool_execution";
    case "content_filter":
      return "content_filter";
    default:
      return undefined;
  }
}

export function tokenUsageFrom(usage: CompletionUsage): TokenUsage {
  return tokenUsage(usage.prompt_tokens, usage.completion_tokens);
}
