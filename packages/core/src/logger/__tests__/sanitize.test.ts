import { describe, expect, it } from "vitest";
import { sanitizeData, serializeError } from "../sanitize.js";

describe("sanitizeData", () => {
  it("redacts secret-looking keys at any depth", () => {
    const input = {
      apiKey: "test-secret",
      headers: { Authorization: "Bearer test-secret", "api-key": "test-secret" },
      model: "gpt-4o",
    };

    expect(sanitizeData(input)).toEqual({
      apiKey: "[REDACTED]",
      headers: { Authorization: "[REDACTED]", "api-key": "[REDACTED]" },
      model: "gpt-4o",
    });
  });

  it("truncates long strings", () => {
    expect(sanitizeData("abcdefgh", { maxStringLength: 3 })).toBe("abc...[truncated 5 chars]");
  });

  it("cuts off deep and circular structures", () => {
    const circular: Record<string, unknown> = { name: "loop" };
    circular.self = circular;

    expect(sanitizeData({ a: { b: { c: 1 } } }, { maxDepth: 2 })).toEqual({
      a: { b: "[Max depth exceeded]" },
    });
    expect(sanitizeData(circular)).toEqual({ name: "loop", self: "[Circular reference]" });
  });

  it("copies an object referenced twice outside a cycle", () => {
    const shared = { a: 1 };

    expect(sanitizeData({ x: shared, y: [shared, shared] })).toEqual({
      x: { a: 1 },
      y: [{ a: 1 }, { a: 1 }],
    });
  });

  it("keeps streamed tool-call fragments at the default depth", () => {
    const chunk = {
      choices: [
        {
          index: 0,
          delta: { tool_calls: [{ index: 0, id: "call_1", function: { name: "get_weather", arguments: '{"ci' } }] },
        },
      ],
    };

    expect(sanitizeData(chunk)).toEqual(chunk);
  });

  it("converts dates, errors and functions", () => {
    function named(): void {}
    const result = sanitizeData({
      at: new Date(Date.UTC(2025, 0, 1)),
      fn: named,
      big: BigInt(7),
    });

    expect(result).toEqual({ at: "2025-01-01T00:00:00.000Z", fn: "[Function: named]", big: "7" });
  });
});

describe("serializeError", () => {
  it("keeps name and message of errors", () => {
    expect(serializeError(new TypeError("bad"))).toMatchObject({ name: "TypeError", message: "bad" });
  });

  it("stringifies other values", () => {
    expect(serializeError(42)).toEqual({ raw: "42" });
  });
});
