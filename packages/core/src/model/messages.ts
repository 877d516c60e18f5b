import type { ToolExecutionRequest } from "./tools.js";

// =============================================================================
// Chat Messages
// =============================================================================

export type ChatMessageType = "system" | "user" | "ai" | "tool_execution_result";

/**
 * Instructions for the model.
 */
export interface SystemMessage {
  type: "system";
  text: string;
}

/**
 * Input from the end user.
 */
export interface UserMessage {
  type: "user";
  text: string;
  /** Name of the participant, for multi-user conversations */
  name?: string;
}

/**
 * Output of the model: text, tool execution requests, or both.
 */
export interface AiMessage {
  type: "ai";
  text?: string;
  toolExecutionRequests?: ToolExecutionRequest[];
}

/**
 * Result of executing a tool the model asked for.
 */
export interface ToolExecutionResultMessage {
  type: "tool_execution_result";
  /** Id of the {@link ToolExecutionRequest} this answers */
  id?: string;
  toolName: string;
  text: string;
}

export type ChatMessage = SystemMessage | UserMessage | AiMessage | ToolExecutionResultMessage;

export function systemMessage(text: string): SystemMessage {
  return { type: "system", text };
}

export function userMessage(text: string, name?: string): UserMessage {
  return name === undefined ? { type: "user", text } : { type: "user", text, name };
}

/**
 * Build an AI message from text or from tool execution requests.
 *
 * An empty request list yields an empty-text message, so every `AiMessage`
 * carries at least one of the two.
 */
export function aiMessage(content: string | ToolExecutionRequest[]): AiMessage {
  if (typeof content === "string") {
    return { type: "ai", text: content };
  }
  if (content.length === 0) {
    return { type: "ai", text: "" };
  }
  return { type: "ai", toolExecutionRequests: content };
}

export function toolExecutionResultMessage(
  request: ToolExecutionRequest,
  result: string
): ToolExecutionResultMessage {
  return { type: "tool_execution_result", id: request.id, toolName: request.name, text: result };
}

export function hasToolExecutionRequests(message: AiMessage): boolean {
  return (message.toolExecutionRequests?.length ?? 0) > 0;
}

/**
 * Plain text of any message; `undefined` for an AI message that only carries
 * tool execution requests.
 */
export function messageText(message: ChatMessage): string | undefined {
  return message.text;
}
