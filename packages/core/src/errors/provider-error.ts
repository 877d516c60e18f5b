/**
 * Errors raised while talking to a vendor service.
 *
 * @module core/errors/provider-error
 */

import { ErrorCode, TesseraError } from "@tessera/shared";

/**
 * Broad failure categories, independent of the vendor.
 */
export type ProviderErrorCategory =
  | "credential_invalid"
  | "rate_limited"
  | "timeout"
  | "network_error"
  | "api_error"
  | "not_found"
  | "context_overflow"
  | "content_filter"
  | "aborted"
  | "unknown";

export interface ErrorClassification {
  code: ErrorCode;
  category: ProviderErrorCategory;
  retryable: boolean;
  /** Suggested delay before retrying */
  retryDelayMs?: number;
}

export interface ProviderErrorContext {
  /** e.g. `azure-openai`, `ollama`, `pinecone` */
  provider?: string;
  model?: string;
  /** Vendor request id, when a response header carried one */
  requestId?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface ProviderErrorOptions extends ErrorClassification {
  statusCode?: number;
  cause?: unknown;
  context?: ProviderErrorContext;
}

/**
 * A classified vendor failure. The original error, when there is one, is kept
 * as `cause`.
 */
export class ProviderError extends TesseraError {
  readonly category: ProviderErrorCategory;
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly retryDelayMs?: number;
  readonly context: ProviderErrorContext;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, options.code, { cause: options.cause });
    this.name = "ProviderError";
    this.category = options.category;
    this.retryable = options.retryable;
    this.statusCode = options.statusCode;
    this.retryDelayMs = options.retryDelayMs;
    this.context = { ...options.context, timestamp: options.context?.timestamp ?? new Date() };
  }

  withContext(context: Partial<ProviderErrorContext>): ProviderError {
    return new ProviderError(this.message, {
      code: this.code,
      category: this.category,
      retryable: this.retryable,
      statusCode: this.statusCode,
      cause: this.cause,
      retryDelayMs: this.retryDelayMs,
      context: { ...this.context, ...context },
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: this.codeName,
      category: this.category,
      retryable: this.retryable,
      statusCode: this.statusCode,
      retryDelayMs: this.retryDelayMs,
      context: { ...this.context, timestamp: this.context.timestamp?.toISOString() },
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Shorthand for errors that do not come from a vendor response, such as
 * invalid client configuration.
 */
export function providerError(
  message: string,
  code: ErrorCode,
  context?: ProviderErrorContext
): ProviderError {
  return new ProviderError(message, {
    code,
    category: code === ErrorCode.ABORTED ? "aborted" : "unknown",
    retryable: false,
    context,
  });
}
