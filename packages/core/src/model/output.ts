// =============================================================================
// Model Output
// =============================================================================

/**
 * Token accounting for one model call. `totalTokenCount` is the sum of the
 * counts that are present.
 */
export interface TokenUsage {
  inputTokenCount?: number;
  outputTokenCount?: number;
  totalTokenCount?: number;
}

export function tokenUsage(inputTokenCount?: number, outputTokenCount?: number): TokenUsage {
  const usage: TokenUsage = {};
  if (inputTokenCount !== undefined) {
    usage.inputTokenCount = inputTokenCount;
  }
  if (outputTokenCount !== undefined) {
    usage.outputTokenCount = outputTokenCount;
  }
  if (inputTokenCount !== undefined || outputTokenCount !== undefined) {
    usage.totalTokenCount = (inputTokenCount ?? 0) + (outputTokenCount ?? 0);
  }
  return usage;
}

function sumCounts(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) {
    return b;
  }
  return b === undefined ? a : a + b;
}

/**
 * Field-wise sum of two usages. Either side may be missing.
 */
export function addTokenUsage(a: TokenUsage | undefined, b: TokenUsage | undefined): TokenUsage | undefined {
  if (!a) {
    return b;
  }
  if (!b) {
    return a;
  }
  return tokenUsage(
    sumCounts(a.inputTokenCount, b.inputTokenCount),
    sumCounts(a.outputTokenCount, b.outputTokenCount)
  );
}

/**
 * Why the model stopped generating.
 */
export type FinishReason = "stop" | "length" | "tool_execution" | "content_filter" | "other";

/**
 * What a model call produced.
 */
export interface ModelResponse<T> {
  content: T;
  tokenUsage?: TokenUsage;
  finishReason?: FinishReason;
}

export function modelResponse<T>(
  content: T,
  tokenUsage?: TokenUsage,
  finishReason?: FinishReason
): ModelResponse<T> {
  const response: ModelResponse<T> = { content };
  if (tokenUsage !== undefined) {
    response.tokenUsage = tokenUsage;
  }
  if (finishReason !== undefined) {
    response.finishReason = finishReason;
  }
  return response;
}
