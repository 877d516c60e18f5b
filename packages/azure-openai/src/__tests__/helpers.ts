import type { ChatCompletionChunk } from "openai/resources/chat/completions";
import type { CompletionUsage } from "openai/resources/completions";
import type { TokenEncoder } from "../tokenizer.js";

/**
 * One token per whitespace-separated word.
 */
export const wordEncoder: TokenEncoder = {
  encode: (text) =>
    text
      .split(/\s+/)
      .filter((word) => word.length > 0)
      .map((_, i) => i),
};

export function chunk(
  delta: ChatCompletionChunk.Choice.Delta,
  finishReason: ChatCompletionChunk.Choice["finish_reason"] = null
): ChatCompletionChunk {
  return {
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: 1_700_000_000,
    model: "gpt-4",
    choices: [{ index: 0, delta, finish_reason: finishReason, logprobs: null }],
  };
}

export function usageChunk(usage: CompletionUsage): ChatCompletionChunk {
  return {
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: 1_700_000_000,
    model: "gpt-4",
    choices: [],
    usage,
  };
}

export async function* streamOf(chunks: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  for (const item of chunks) {
    yield item;
  }
}
