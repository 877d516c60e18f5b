/**
 * Payload cleanup for request/response logging.
 *
 * @module logger/sanitize
 */

const SECRET_KEY_PATTERN = /^(api[-_]?key|authorization|password|secret|token|access[-_]?token)$/i;

const REDACTED = "[REDACTED]";

export interface SanitizeOptions {
  /** Maximum nesting depth (default: 8) */
  maxDepth?: number;
  /** Strings longer than this are truncated (default: 1000) */
  maxStringLength?: number;
}

/**
 * Turn an error into a plain object for structured logs.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { raw: String(error) };
}

/**
 * Copy `data` for logging: secret-looking keys are redacted, long strings
 * truncated, deep or circular structures cut off.
 *
 * @example
 * ```typescript
 * sanitizeData({ apiKey: "test-secret", messages: [] });
 * // { apiKey: "[REDACTED]", messages: [] }
 * ```
 */
export function sanitizeData(data: unknown, options: SanitizeOptions = {}): unknown {
  const maxDepth = options.maxDepth ?? 8;
  const maxStringLength = options.maxStringLength ?? 1000;
  // Ancestors of the value being visited; shared references are not cycles
  const seen = new WeakSet<object>();

  const visit = (value: unknown, depth: number): unknown => {
    if (typeof value === "string") {
      return value.length > maxStringLength
        ? `${value.slice(0, maxStringLength)}...[truncated ${value.length - maxStringLength} chars]`
        : value;
    }
    if (typeof value === "bigint" || typeof value === "symbol") {
      return value.toString();
    }
    if (typeof value === "function") {
      return `[Function: ${value.name || "anonymous"}]`;
    }
    if (value === null || typeof value !== "object") {
      return value;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (value instanceof Error) {
      return serializeError(value);
    }
    if (depth >= maxDepth) {
      return "[Max depth exceeded]";
    }
    if (seen.has(value)) {
      return "[Circular reference]";
    }
    seen.add(value);

    let result: unknown;
    if (Array.isArray(value)) {
      result = value.map((item) => visit(item, depth + 1));
    } else {
      const copy: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        copy[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : visit(item, depth + 1);
      }
      result = copy;
    }

    seen.delete(value);
    return result;
  };

  return visit(data, 0);
}
