import { ErrorCode, TesseraError } from "@tessera/shared";
import { describe, expect, it, vi } from "vitest";
import type { ModelResponse } from "../../model/output.js";
import { Embedding } from "../embedding.js";
import { BaseEmbeddingModel } from "../embedding-model.js";
import { type TextSegment, textSegment, toMetadata } from "../text-segment.js";

class FixedModel extends BaseEmbeddingModel {
  readonly embedAllSpy = vi.fn(
    async (segments: TextSegment[]): Promise<ModelResponse<Embedding[]>> => ({
      content: segments.map((segment) => new Embedding([segment.text.length])),
      tokenUsage: { inputTokenCount: segments.length, totalTokenCount: segments.length },
    })
  );

  embedAll(segments: TextSegment[]): Promise<ModelResponse<Embedding[]>> {
    return this.embedAllSpy(segments);
  }
}

describe("BaseEmbeddingModel", () => {
  it("embeds a string through embedAll", async () => {
    const model = new FixedModel();

    const response = await model.embed("four");

    expect(response.content.vector).toEqual([4]);
    expect(response.tokenUsage).toEqual({ inputTokenCount: 1, totalTokenCount: 1 });
    expect(model.embedAllSpy).toHaveBeenCalledWith([{ text: "four", metadata: {} }]);
  });

  it("passes segments through unchanged", async () => {
    const model = new FixedModel();
    const segment = textSegment("abc", { page: 2 });

    await model.embed(segment);

    expect(model.embedAllSpy).toHaveBeenCalledWith([segment]);
  });

  it("fails with an API error when the batch comes back empty", async () => {
    const model = new FixedModel();
    model.embedAllSpy.mockResolvedValueOnce({ content: [] });

    const error = await model.embed("four").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TesseraError);
    expect(error).toMatchObject({ code: ErrorCode.API_ERROR, message: "Embedding model returned no embedding" });
  });
});

describe("toMetadata", () => {
  it("keeps scalar values only", () => {
    expect(toMetadata({ a: "x", b: 1, c: true, d: null, e: { nested: 1 }, f: [1] })).toEqual({
      a: "x",
      b: 1,
      c: true,
    });
  });
});
