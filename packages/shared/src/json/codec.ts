/**
 * JSON encoding and decoding.
 *
 * @module shared/json/codec
 */

import { Readable } from "node:stream";
import { z } from "zod";
import { ErrorCode } from "../errors/codes.js";
import { TesseraError } from "../errors/tessera-error.js";

/**
 * Pluggable JSON encoder/decoder.
 */
export interface JsonCodec {
  toJson(value: unknown): string;
  fromJson(json: string): unknown;
  fromJson<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
  toInputStream(value: unknown): Readable;
}

const STRING_MAP_SCHEMA = z.record(z.string());

/**
 * Default codec: two-space indented output, `Date` as ISO-8601, zod-validated
 * decoding.
 */
export class DefaultJsonCodec implements JsonCodec {
  private readonly indent: number;

  constructor(options: { indent?: number } = {}) {
    this.indent = options.indent ?? 2;
  }

  toJson(value: unknown): string {
    return stringify(value, this.indent);
  }

  fromJson(json: string): unknown;
  fromJson<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
  fromJson<T>(json: string, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): unknown {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw new TesseraError(
        `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.INVALID_ARGUMENT,
        { cause: error }
      );
    }

    if (!schema) {
      return parsed;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new TesseraError(`JSON does not match schema: ${issues}`, ErrorCode.INVALID_ARGUMENT, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /** Streams compact JSON, without the indentation `toJson` applies */
  toInputStream(value: unknown): Readable {
    return Readable.from([Buffer.from(stringify(value), "utf8")]);
  }
}

function stringify(value: unknown, indent?: number): string {
  // JSON.stringify yields undefined for undefined and functions
  const json: string | undefined = JSON.stringify(value, null, indent);
  return json ?? "null";
}

let codec: JsonCodec = new DefaultJsonCodec();

function toJson(value: unknown): string {
  return codec.toJson(value);
}

function fromJson(json: string): unknown;
function fromJson<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
function fromJson<T>(json: string, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): unknown {
  return schema ? codec.fromJson(json, schema) : codec.fromJson(json);
}

/**
 * Decode a JSON object whose values are all strings.
 */
function fromJsonToStringMap(json: string): Map<string, string> {
  return new Map(Object.entries(codec.fromJson(json, STRING_MAP_SCHEMA)));
}

function toInputStream(value: unknown): Readable {
  return codec.toInputStream(value);
}

/**
 * Process-wide JSON facade backed by a replaceable {@link JsonCodec}.
 */
export const Json = {
  toJson,
  fromJson,
  fromJsonToStringMap,
  toInputStream,
  setCodec(next: JsonCodec): void {
    codec = next;
  },
  resetCodec(): void {
    codec = new DefaultJsonCodec();
  },
};
