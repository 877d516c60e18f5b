/**
 * Unit tests for the JSON codec and facade
 *
 * @module shared/__tests__/json
 */

import type { Readable } from "node:stream";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { ErrorCode } from "../errors/codes.js";
import { TesseraError } from "../errors/tessera-error.js";
import { DefaultJsonCodec, Json, type JsonCodec } from "../json/codec.js";
import { LocalDate } from "../json/local-date.js";

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

describe("DefaultJsonCodec", () => {
  const codec = new DefaultJsonCodec();

  it("pretty-prints with two-space indentation", () => {
    expect(codec.toJson({ a: 1, b: [1, 2] })).toBe('{\n  "a": 1,\n  "b": [\n    1,\n    2\n  ]\n}');
  });

  it("serializes dates as ISO-8601 and local dates as YYYY-MM-DD", () => {
    const value = {
      at: new Date(Date.UTC(2024, 0, 15, 10, 30, 0)),
      on: LocalDate.of(2024, 1, 5),
    };

    expect(new DefaultJsonCodec({ indent: 0 }).toJson(value)).toBe(
      '{"at":"2024-01-15T10:30:00.000Z","on":"2024-01-05"}'
    );
  });

  it("encodes undefined as null", () => {
    expect(codec.toJson(undefined)).toBe("null");
  });

  it("parses without a schema", () => {
    expect(codec.fromJson('{"a":[1,"x",null]}')).toEqual({ a: [1, "x", null] });
  });

  it("validates against a schema and coerces dates", () => {
    const schema = z.object({ name: z.string(), at: z.coerce.date() });

    const value = codec.fromJson('{"name":"n","at":"2024-01-15T10:30:00.000Z"}', schema);

    expect(value.name).toBe("n");
    expect(value.at.getTime()).toBe(Date.UTC(2024, 0, 15, 10, 30, 0));
  });

  it("rejects malformed JSON with INVALID_ARGUMENT", () => {
    expect.assertions(2);
    try {
      codec.fromJson("{not json");
    } catch (error) {
      expect(error).toBeInstanceOf(TesseraError);
      expect(error instanceof TesseraError && error.code).toBe(ErrorCode.INVALID_ARGUMENT);
    }
  });

  it("rejects schema mismatches with INVALID_ARGUMENT", () => {
    const schema = z.object({ count: z.number() });

    expect(() => codec.fromJson('{"count":"three"}', schema)).toThrow(/count: Expected number/);
  });

  it("streams compact UTF-8 JSON text", async () => {
    const stream = codec.toInputStream({ text: "héllo", tags: ["a"] });

    expect(await readAll(stream)).toBe('{"text":"héllo","tags":["a"]}');
  });
});

describe("LocalDate", () => {
  it("parses and prints ISO dates", () => {
    expect(LocalDate.parse("2023-12-31").toString()).toBe("2023-12-31");
    expect(LocalDate.parse("2023-12-31").equals(LocalDate.of(2023, 12, 31))).toBe(true);
  });

  it("rejects impossible dates", () => {
    expect(() => LocalDate.of(2023, 2, 30)).toThrow(RangeError);
    expect(() => LocalDate.parse("2023-1-1")).toThrow(RangeError);
  });

  it("takes the UTC calendar date of an instant", () => {
    expect(LocalDate.fromDate(new Date(Date.UTC(2020, 1, 29, 23, 59))).toString()).toBe(
      "2020-02-29"
    );
  });
});

describe("Json", () => {
  afterEach(() => {
    Json.resetCodec();
  });

  it("decodes string maps", () => {
    const map = Json.fromJsonToStringMap('{"a":"1","b":"two"}');

    expect([...map.entries()]).toEqual([
      ["a", "1"],
      ["b", "two"],
    ]);
  });

  it("rejects string maps with non-string values", () => {
    expect(() => Json.fromJsonToStringMap('{"a":1}')).toThrow(TesseraError);
  });

  it("delegates to a replaced codec", () => {
    class CustomCodec extends DefaultJsonCodec {
      toJson(): string {
        return "custom";
      }
    }
    const custom: JsonCodec = new CustomCodec();

    Json.setCodec(custom);
    expect(Json.toJson({ a: 1 })).toBe("custom");

    Json.resetCodec();
    expect(Json.toJson({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});
