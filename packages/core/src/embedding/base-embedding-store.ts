import { ErrorCode, randomUUID, TesseraError } from "@tessera/shared";
import type { Embedding } from "./embedding.js";
import type { EmbeddingMatch, EmbeddingStore } from "./embedding-store.js";

/**
 * An entry handed to {@link BaseEmbeddingStore.upsert}.
 */
export interface EmbeddingRecord<Embedded> {
  id: string;
  embedding: Embedding;
  embedded?: Embedded;
}

/**
 * Implements the {@link EmbeddingStore} conveniences on top of two primitives,
 * `upsert` and `query`.
 *
 * Subclasses that scope entries by memory override `queryMemory`; the default
 * rejects with `NOT_IMPLEMENTED`.
 */
export abstract class BaseEmbeddingStore<Embedded> implements EmbeddingStore<Embedded> {
  protected abstract upsert(records: EmbeddingRecord<Embedded>[]): Promise<void>;

  protected abstract query(
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore: number
  ): Promise<EmbeddingMatch<Embedded>[]>;

  protected queryMemory(
    memoryId: string,
    _referenceEmbedding: Embedding,
    _maxResults: number,
    _minScore: number
  ): Promise<EmbeddingMatch<Embedded>[]> {
    return Promise.reject(
      new TesseraError(
        `${this.constructor.name} does not support memory-scoped search (memory ${memoryId})`,
        ErrorCode.NOT_IMPLEMENTED
      )
    );
  }

  protected generateId(): string {
    return randomUUID();
  }

  async add(embedding: Embedding): Promise<string> {
    const id = this.generateId();
    await this.upsert([{ id, embedding }]);
    return id;
  }

  async addWithId(id: string, embedding: Embedding): Promise<void> {
    await this.upsert([{ id, embedding }]);
  }

  async addWithContent(embedding: Embedding, embedded: Embedded): Promise<string> {
    const id = this.generateId();
    await this.upsert([{ id, embedding, embedded }]);
    return id;
  }

  async addAll(embeddings: Embedding[]): Promise<string[]> {
    const records = embeddings.map((embedding) => ({ id: this.generateId(), embedding }));
    if (records.length > 0) {
      await this.upsert(records);
    }
    return records.map((record) => record.id);
  }

  async addAllWithContent(embeddings: Embedding[], embedded: Embedded[]): Promise<string[]> {
    if (embeddings.length !== embedded.length) {
      throw new TesseraError(
        `The list of embeddings (${embeddings.length}) and the list of embedded content (${embedded.length}) must have the same size`,
        ErrorCode.INVALID_ARGUMENT
      );
    }
    const records = embeddings.map((embedding, index) => ({
      id: this.generateId(),
      embedding,
      embedded: embedded[index],
    }));
    if (records.length > 0) {
      await this.upsert(records);
    }
    return records.map((record) => record.id);
  }

  async findRelevant(
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore = 0
  ): Promise<EmbeddingMatch<Embedded>[]> {
    validateSearch(maxResults, minScore);
    return this.query(referenceEmbedding, maxResults, minScore);
  }

  async findRelevantForMemory(
    memoryId: string,
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore = 0
  ): Promise<EmbeddingMatch<Embedded>[]> {
    validateSearch(maxResults, minScore);
    return this.queryMemory(memoryId, referenceEmbedding, maxResults, minScore);
  }
}

function validateSearch(maxResults: number, minScore: number): void {
  if (!Number.isInteger(maxResults) || maxResults < 1) {
    throw new TesseraError(`maxResults must be a positive integer, got ${maxResults}`, ErrorCode.INVALID_ARGUMENT);
  }
  if (minScore < 0 || minScore > 1) {
    throw new TesseraError(`minScore must be between 0 and 1, got ${minScore}`, ErrorCode.INVALID_ARGUMENT);
  }
}
