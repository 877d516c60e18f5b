import type { AiMessage, ChatMessage } from "./messages.js";
import type { ModelResponse } from "./output.js";
import type { ToolSpecification } from "./tools.js";

/**
 * Receives a streamed model response.
 *
 * Callers get zero or more `onNext` calls, then exactly one of `onComplete` or
 * `onError`.
 */
export interface StreamingResponseHandler<T> {
  /** A non-empty piece of generated text, in stream order */
  onNext(token: string): void;
  onComplete(response: ModelResponse<T>): void;
  onError(error: unknown): void;
}

/**
 * A chat model that streams its answer.
 *
 * Every method resolves once the terminal callback has run. Errors from the
 * vendor, the stream or `onNext` go to `onError`; an error thrown by
 * `onComplete` or `onError` themselves rejects the returned promise.
 */
export interface StreamingChatLanguageModel {
  generate(messages: ChatMessage[], handler: StreamingResponseHandler<AiMessage>): Promise<void>;
  generate(
    messages: ChatMessage[],
    toolSpecifications: ToolSpecification[],
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<void>;
  /**
   * Stream a response in which the model must call `toolSpecification`.
   */
  generateForcingTool(
    messages: ChatMessage[],
    toolSpecification: ToolSpecification,
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<void>;
}

export interface TokenCountEstimator {
  estimateTokenCount(messages: ChatMessage[]): number;
}

/**
 * Split the two `generate` call shapes into tools and handler.
 */
export function resolveGenerateArguments(
  toolsOrHandler: ToolSpecification[] | StreamingResponseHandler<AiMessage>,
  handler?: StreamingResponseHandler<AiMessage>
): { toolSpecifications: ToolSpecification[]; handler: StreamingResponseHandler<AiMessage> } {
  if (Array.isArray(toolsOrHandler)) {
    if (!handler) {
      throw new TypeError("A response handler is required");
    }
    return { toolSpecifications: toolsOrHandler, handler };
  }
  return { toolSpecifications: [], handler: toolsOrHandler };
}
