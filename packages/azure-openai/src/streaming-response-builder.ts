/**
 * Assembles streamed chat completion chunks into a single response.
 *
 * @module @tessera/azure-openai/streaming-response-builder
 */

import type {
  AiMessage,
  ModelResponse,
  TokenUsage,
  Tokenizer,
  ToolExecutionRequest,
} from "@tessera/core";
import { aiMessage, modelResponse, tokenUsage } from "@tessera/core";
import type { ChatCompletionChunk } from "openai/resources/chat/completions";
import { finishReasonFrom, tokenUsageFrom } from "./mappers.js";

interface ToolCallBuffer {
  id?: string;
  name: string;
  arguments: string;
}

/**
 * Accumulates the text, tool calls, finish reason and usage of one streamed
 * response. Not safe to share between concurrent streams.
 *
 * @example
 * ```typescript
 * const builder = new AzureOpenAiStreamingResponseBuilder(inputTokenCount);
 * for await (const chunk of stream) {
 *   builder.append(chunk);
 * }
 * const response = builder.build(tokenizer, false);
 * ```
 */
export class AzureOpenAiStreamingResponseBuilder {
  private content = "";
  private readonly toolCalls = new Map<number, ToolCallBuffer>();
  private finishReason: string | undefined;
  private usage: TokenUsage | undefined;

  constructor(private readonly inputTokenCount?: number) {}

  append(chunk: ChatCompletionChunk | null | undefined): void {
    if (!chunk) {
      return;
    }

    if (chunk.usage) {
      this.usage = tokenUsageFrom(chunk.usage);
    }

    const choice = chunk.choices[0];
    if (!choice) {
      return;
    }

    if (choice.finish_reason) {
      this.finishReason = choice.finish_reason;
    }

    const delta = choice.delta;
    if (delta.content !== undefined && delta.content !== null) {
      this.content += delta.content;
      return;
    }

    for (const fragment of delta.tool_calls ?? []) {
      let buffer = this.toolCalls.get(fragment.index);
      if (!buffer) {
        buffer = { name: "", arguments: "" };
        this.toolCalls.set(fragment.index, buffer);
      }
      if (fragment.id && buffer.id === undefined) {
        buffer.id = fragment.id;
      }
      if (fragment.function?.name) {
        buffer.name += fragment.function.name;
      }
      if (fragment.function?.arguments) {
        buffer.arguments += fragment.function.arguments;
      }
    }
  }

  build(tokenizer?: Tokenizer, forcefulToolExecution = false): ModelResponse<AiMessage> {
    const finishReason = finishReasonFrom(this.finishReason);

    if (this.content.length > 0) {
      return modelResponse(
        aiMessage(this.content),
        this.resolveUsage(tokenizer, (t) => t.estimateTokenCountInText(this.content)),
        finishReason
      );
    }

    const requests = this.toolExecutionRequests();
    const [first] = requests;
    if (first) {
      return modelResponse(
        aiMessage(requests),
        this.resolveUsage(tokenizer, (t) =>
          forcefulToolExecution
            ? t.estimateTokenCountInForcefulToolExecutionRequest(first)
            : t.estimateTokenCountInToolExecutionRequests(requests)
        ),
        finishReason
      );
    }

    return modelResponse(aiMessage(""), this.resolveUsage(tokenizer, () => 0), finishReason);
  }

  private toolExecutionRequests(): ToolExecutionRequest[] {
    return [...this.toolCalls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, buffer]) =>
        buffer.id === undefined
          ? { name: buffer.name, arguments: buffer.arguments }
          : { id: buffer.id, name: buffer.name, arguments: buffer.arguments }
      );
  }

  private resolveUsage(
    tokenizer: Tokenizer | undefined,
    estimateOutput: (tokenizer: Tokenizer) => number
  ): TokenUsage | undefined {
    if (this.usage) {
      return this.usage;
    }
    if (!tokenizer) {
      return undefined;
    }
    return tokenUsage(this.inputTokenCount, estimateOutput(tokenizer));
  }
}
