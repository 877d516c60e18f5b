/**
 * Classification of arbitrary errors into {@link ProviderError}s.
 *
 * @module core/errors/classify
 */

import { ErrorCode } from "@tessera/shared";
import {
  type ErrorClassification,
  ProviderError,
  type ProviderErrorContext,
} from "./provider-error.js";

const HTTP_STATUS_CLASSIFICATION: Record<number, ErrorClassification> = {
  400: { code: ErrorCode.INVALID_ARGUMENT, category: "api_error", retryable: false },
  401: { code: ErrorCode.CREDENTIAL_VALIDATION_FAILED, category: "credential_invalid", retryable: false },
  403: { code: ErrorCode.CREDENTIAL_VALIDATION_FAILED, category: "credential_invalid", retryable: false },
  404: { code: ErrorCode.PROVIDER_NOT_FOUND, category: "not_found", retryable: false },
  408: { code: ErrorCode.TIMEOUT, category: "timeout", retryable: true, retryDelayMs: 1000 },
  422: { code: ErrorCode.INVALID_ARGUMENT, category: "api_error", retryable: false },
  // Retry-After, when present, overrides the default delay
  429: { code: ErrorCode.RATE_LIMITED, category: "rate_limited", retryable: true, retryDelayMs: 1000 },
  500: { code: ErrorCode.API_ERROR, category: "api_error", retryable: true, retryDelayMs: 1000 },
  502: { code: ErrorCode.SERVICE_UNAVAILABLE, category: "api_error", retryable: true, retryDelayMs: 2000 },
  503: { code: ErrorCode.SERVICE_UNAVAILABLE, category: "api_error", retryable: true, retryDelayMs: 5000 },
  504: { code: ErrorCode.TIMEOUT, category: "timeout", retryable: true, retryDelayMs: 2000 },
};

const REQUEST_ID_HEADERS = ["x-request-id", "apim-request-id", "x-ms-request-id", "request-id"];

const MAX_RETRY_DELAY_MS = 60_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read a header from either a fetch `Headers` object or a plain record.
 */
function readHeader(error: unknown, name: string): string | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const headers = error.headers;
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (!isRecord(headers)) {
    return undefined;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && typeof value === "string") {
      return value;
    }
  }
  return undefined;
}

function getStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.status === "number") {
    return error.status;
  }
  if (typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (isRecord(error)) {
    if (typeof error.message === "string") {
      return error.message;
    }
    if (typeof error.error === "string") {
      return error.error;
    }
  }
  return "Unknown error";
}

/**
 * Classify an HTTP status code.
 *
 * @example
 * ```typescript
 * classifyHttpStatus(429);
 * // { code: ErrorCode.RATE_LIMITED, category: "rate_limited", retryable: true, retryDelayMs: 1000 }
 * ```
 */
export function classifyHttpStatus(statusCode: number): ErrorClassification {
  const exact = HTTP_STATUS_CLASSIFICATION[statusCode];
  if (exact) {
    return exact;
  }
  if (statusCode >= 500) {
    return { code: ErrorCode.API_ERROR, category: "api_error", retryable: true, retryDelayMs: 1000 };
  }
  if (statusCode >= 400) {
    return { code: ErrorCode.API_ERROR, category: "api_error", retryable: false };
  }
  return { code: ErrorCode.UNKNOWN, category: "unknown", retryable: false };
}

function classifyByMessage(message: string, name: string): ErrorClassification {
  if (name === "aborterror" || message.includes("aborted") || message.includes("canceled")) {
    return { code: ErrorCode.ABORTED, category: "aborted", retryable: false };
  }
  if (
    name.includes("timeout") ||
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("etimedout")
  ) {
    return { code: ErrorCode.TIMEOUT, category: "timeout", retryable: true, retryDelayMs: 2000 };
  }
  if (
    name.includes("connection") ||
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("enotfound") ||
    message.includes("fetch failed") ||
    message.includes("connection error") ||
    message.includes("socket hang up") ||
    message.includes("network")
  ) {
    return { code: ErrorCode.NETWORK_ERROR, category: "network_error", retryable: true, retryDelayMs: 1000 };
  }
  if (
    message.includes("context_length_exceeded") ||
    message.includes("maximum context length") ||
    message.includes("token limit")
  ) {
    return { code: ErrorCode.CONTEXT_OVERFLOW, category: "context_overflow", retryable: false };
  }
  if (message.includes("content_filter") || message.includes("content management policy")) {
    return { code: ErrorCode.CONTENT_FILTERED, category: "content_filter", retryable: false };
  }
  return { code: ErrorCode.UNKNOWN, category: "unknown", retryable: false };
}

/**
 * Classify any thrown value: already-classified errors keep their
 * classification, errors carrying an HTTP status are classified by status,
 * anything else by its name and message.
 */
export function classifyProviderError(error: unknown): ErrorClassification {
  if (error instanceof ProviderError) {
    return {
      code: error.code,
      category: error.category,
      retryable: error.retryable,
      retryDelayMs: error.retryDelayMs,
    };
  }

  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    const byStatus = classifyHttpStatus(statusCode);
    // 400s that report an overflowing prompt are more useful as CONTEXT_OVERFLOW
    if (statusCode === 400) {
      const byMessage = classifyByMessage(getErrorMessage(error).toLowerCase(), "");
      if (byMessage.category === "context_overflow" || byMessage.category === "content_filter") {
        return byMessage;
      }
    }
    return byStatus;
  }

  const name = error instanceof Error ? error.name.toLowerCase() : "";
  return classifyByMessage(getErrorMessage(error).toLowerCase(), name);
}

export function isRetryable(error: unknown): boolean {
  return classifyProviderError(error).retryable;
}

/**
 * `Retry-After` in milliseconds, from the error's headers or a
 * `retryAfter` (seconds) property.
 */
export function extractRetryAfter(error: unknown): number | undefined {
  const header = readHeader(error, "retry-after");
  if (header !== undefined) {
    const seconds = Number.parseInt(header, 10);
    if (!Number.isNaN(seconds)) {
      return seconds * 1000;
    }
  }
  if (isRecord(error) && typeof error.retryAfter === "number") {
    return error.retryAfter * 1000;
  }
  return undefined;
}

/**
 * Suggested delay before retry `attempt` (1-based): `Retry-After` when the
 * vendor sent one, else exponential backoff from the classification's delay
 * with up to 30% jitter, capped at one minute.
 */
export function getRetryDelay(error: unknown, attempt = 1): number {
  const retryAfter = extractRetryAfter(error);
  if (retryAfter !== undefined) {
    return retryAfter;
  }
  const base = classifyProviderError(error).retryDelayMs ?? 1000;
  const exponential = base * 2 ** (attempt - 1);
  const jitter = Math.random() * 0.3 * exponential;
  return Math.min(exponential + jitter, MAX_RETRY_DELAY_MS);
}

/**
 * Wrap any thrown value into a {@link ProviderError}. ProviderErrors gain the
 * extra context; everything else is classified and kept as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   await index.query(request);
 * } catch (error) {
 *   throw createProviderError(error, { provider: "pinecone" });
 * }
 * ```
 */
export function createProviderError(
  error: unknown,
  context: string | ProviderErrorContext = {}
): ProviderError {
  const errorContext: ProviderErrorContext = typeof context === "string" ? {} : { ...context };
  const requestId = REQUEST_ID_HEADERS.map((header) => readHeader(error, header)).find(
    (value) => value !== undefined
  );
  if (requestId !== undefined && errorContext.requestId === undefined) {
    errorContext.requestId = requestId;
  }

  if (error instanceof ProviderError) {
    return error.withContext(errorContext);
  }

  const originalMessage = getErrorMessage(error);
  const classification = classifyProviderError(error);
  return new ProviderError(
    typeof context === "string" ? `${context}: ${originalMessage}` : originalMessage,
    {
      ...classification,
      statusCode: getStatusCode(error),
      cause: error,
      context: errorContext,
    }
  );
}
