/**
 * Structured logging of model calls.
 *
 * @module logger/model-logger
 */

import type { Logger } from "./logger.js";
import { sanitizeData, serializeError } from "./sanitize.js";

export interface ModelCallLoggerOptions {
  /** Vendor name, e.g. `azure-openai` */
  provider: string;
  /** Model or deployment name */
  model: string;
  /** Log each request and streamed chunk at debug level */
  logRequestsAndResponses?: boolean;
}

/**
 * Logs the lifecycle of one adapter's model calls in a consistent shape.
 *
 * @example
 * ```typescript
 * const calls = new ModelCallLogger(logger, { provider: "ollama", model: "llama3" });
 * const call = calls.start(request);
 * // ...
 * call.complete({ inputTokens: 12, outputTokens: 40 });
 * ```
 */
export class ModelCallLogger {
  private readonly logger: Logger;
  private readonly logPayloads: boolean;

  constructor(logger: Logger, options: ModelCallLoggerOptions) {
    this.logger = logger.child({ provider: options.provider, model: options.model });
    this.logPayloads = options.logRequestsAndResponses ?? false;
  }

  start(request: unknown): ModelCall {
    if (this.logPayloads) {
      this.logger.debug("Model request", { request: sanitizeData(request) });
    }
    return new ModelCall(this.logger, this.logPayloads);
  }
}

/**
 * A single in-flight call.
 */
export class ModelCall {
  private readonly startedAt = Date.now();
  private chunkCount = 0;

  constructor(
    private readonly logger: Logger,
    private readonly logPayloads: boolean
  ) {}

  chunk(chunk: unknown): void {
    this.chunkCount++;
    if (this.logPayloads) {
      this.logger.debug("Model response chunk", { chunk: sanitizeData(chunk) });
    }
  }

  complete(usage: { inputTokens?: number; outputTokens?: number } = {}): void {
    this.logger.debug("Model call completed", {
      event: "model.call.complete",
      chunks: this.chunkCount,
      durationMs: Date.now() - this.startedAt,
      ...usage,
    });
  }

  fail(error: unknown): void {
    this.logger.warn("Model call failed", {
      event: "model.call.error",
      chunks: this.chunkCount,
      durationMs: Date.now() - this.startedAt,
      error: serializeError(error),
    });
  }
}
