import type { ChatMessage } from "./messages.js";
import type { ToolExecutionRequest, ToolSpecification } from "./tools.js";

/**
 * Estimates how many tokens a model will bill for text, messages and tools.
 *
 * Estimates follow the vendor's counting rules as closely as they are known;
 * the vendor's own usage report, when available, is authoritative.
 */
export interface Tokenizer {
  estimateTokenCountInText(text: string): number;
  estimateTokenCountInMessage(message: ChatMessage): number;
  estimateTokenCountInMessages(messages: readonly ChatMessage[]): number;
  estimateTokenCountInToolSpecification(toolSpecification: ToolSpecification): number;
  estimateTokenCountInToolSpecifications(toolSpecifications: readonly ToolSpecification[]): number;
  /** Cost of a tool the request forces the model to call */
  estimateTokenCountInForcefulToolSpecification(toolSpecification: ToolSpecification): number;
  estimateTokenCountInToolExecutionRequests(requests: readonly ToolExecutionRequest[]): number;
  /** Cost of the single request a forced tool call produces */
  estimateTokenCountInForcefulToolExecutionRequest(request: ToolExecutionRequest): number;
}
