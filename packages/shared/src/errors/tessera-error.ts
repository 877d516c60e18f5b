import { ErrorCode } from "./codes.js";

/**
 * Base error for failures raised by Tessera itself (as opposed to errors
 * surfaced from a vendor SDK).
 *
 * @example
 * ```typescript
 * throw new TesseraError("embeddings and contents differ in length", ErrorCode.INVALID_ARGUMENT);
 * ```
 */
export class TesseraError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TesseraError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesseraError);
    }
  }

  /** Human-readable code name, e.g. `INVALID_ARGUMENT`. */
  get codeName(): string {
    return ErrorCode[this.code];
  }
}
