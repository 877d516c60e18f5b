import { ErrorCode, TesseraError } from "@tessera/shared";
import type { ModelResponse } from "../model/output.js";
import type { Embedding } from "./embedding.js";
import { type TextSegment, textSegment } from "./text-segment.js";

/**
 * Turns text into embeddings.
 */
export interface EmbeddingModel {
  embed(text: string | TextSegment): Promise<ModelResponse<Embedding>>;
  embedAll(segments: TextSegment[]): Promise<ModelResponse<Embedding[]>>;
}

/**
 * Base for models whose vendor API is batch-only: `embed` delegates to
 * `embedAll` with one segment.
 */
export abstract class BaseEmbeddingModel implements EmbeddingModel {
  abstract embedAll(segments: TextSegment[]): Promise<ModelResponse<Embedding[]>>;

  async embed(text: string | TextSegment): Promise<ModelResponse<Embedding>> {
    const segment = typeof text === "string" ? textSegment(text) : text;
    const response = await this.embedAll([segment]);
    const [embedding] = response.content;
    if (!embedding) {
      throw new TesseraError("Embedding model returned no embedding", ErrorCode.API_ERROR);
    }
    return { ...response, content: embedding };
  }
}
