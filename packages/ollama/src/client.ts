/**
 * HTTP client for a local or remote Ollama server.
 *
 * @module @tessera/ollama/client
 */

import {
  classifyHttpStatus,
  createProviderError,
  extractRetryAfter,
  Logger,
  ProviderError,
  type ProviderErrorContext,
  withProviderRetry,
} from "@tessera/core";
import { ErrorCode, Json, TesseraError } from "@tessera/shared";
import { z } from "zod";
import { readLines } from "./ndjson.js";
import {
  type ChatRequest,
  type ChatResponse,
  ChatResponseSchema,
  type EmbedRequest,
  type EmbedResponse,
  EmbedResponseSchema,
} from "./types.js";

export const DEFAULT_BASE_URL = "http://localhost:11434";

const ErrorBodySchema = z.object({ error: z.string() });

export interface OllamaClientOptions {
  baseUrl?: string;
  /** Milliseconds to wait for response headers (default: 60000) */
  timeout?: number;
  /** Retries of a request that failed to start (default: 3) */
  maxRetries?: number;
  /** Upper bound for the delay between retries (default: 60000) */
  maxRetryDelayMs?: number;
  logger?: Logger;
}

/**
 * Thin wrapper over Ollama's native `/api` endpoints.
 *
 * @example
 * ```typescript
 * const client = new OllamaClient({ baseUrl: "http://localhost:11434" });
 * for await (const chunk of client.chatStream({ model: "llama3", messages })) {
 *   process.stdout.write(chunk.message?.content ?? "");
 * }
 * ```
 */
export class OllamaClient {
  readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly maxRetryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeout = options.timeout ?? 60_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 60_000;
    this.logger = options.logger ?? Logger.silent();
  }

  /**
   * Stream a chat completion. Yields every NDJSON object up to and including
   * the one with `done: true`.
   */
  async *chatStream(request: ChatRequest): AsyncGenerator<ChatResponse> {
    const context: ProviderErrorContext = { provider: "ollama", model: request.model };
    const response = await this.post("/api/chat", { ...request, stream: true }, context);
    if (!response.body) {
      throw new ProviderError("Ollama returned an empty response body", {
        ...classifyHttpStatus(502),
        context,
      });
    }

    for await (const line of readLines(response.body)) {
      const chunk = this.decode(line, ChatResponseSchema, context);
      if (chunk.error !== undefined) {
        throw new ProviderError(`Ollama generation failed: ${chunk.error}`, {
          ...classifyHttpStatus(500),
          retryable: false,
          context,
        });
      }
      yield chunk;
    }
  }

  async embed(request: EmbedRequest): Promise<EmbedResponse> {
    const context: ProviderErrorContext = { provider: "ollama", model: request.model };
    const response = await this.post("/api/embed", request, context);
    return this.decode(await response.text(), EmbedResponseSchema, context);
  }

  private async post(path: string, body: unknown, context: ProviderErrorContext): Promise<Response> {
    return withProviderRetry(() => this.send(path, body, context), {
      maxRetries: this.maxRetries,
      maxDelayMs: this.maxRetryDelayMs,
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn("Retrying Ollama request", {
          path,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });
  }

  private async send(path: string, body: unknown, context: ProviderErrorContext): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ProviderError(`Ollama did not respond within ${this.timeout}ms`, {
          code: ErrorCode.TIMEOUT,
          category: "timeout",
          retryable: true,
          cause: error,
          context,
        });
      }
      throw createProviderError(error, context);
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw await this.httpError(response, context);
    }
    return response;
  }

  private async httpError(response: Response, context: ProviderErrorContext): Promise<ProviderError> {
    const text = await response.text();
    const detail = this.errorDetail(text);
    const classification = classifyHttpStatus(response.status);
    return new ProviderError(`Ollama request failed with status ${response.status}: ${detail}`, {
      ...classification,
      statusCode: response.status,
      retryDelayMs: extractRetryAfter(response) ?? classification.retryDelayMs,
      context,
    });
  }

  private errorDetail(text: string): string {
    try {
      return Json.fromJson(text, ErrorBodySchema).error;
    } catch (error) {
      if (error instanceof TesseraError) {
        return text || "no details";
      }
      throw error;
    }
  }

  private decode<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, context: ProviderErrorContext): T {
    try {
      return Json.fromJson(json, schema);
    } catch (error) {
      if (error instanceof TesseraError) {
        throw new ProviderError(`Unexpected response from Ollama: ${error.message}`, {
          code: ErrorCode.API_ERROR,
          category: "api_error",
          retryable: false,
          cause: error,
          context,
        });
      }
      throw error;
    }
  }
}
