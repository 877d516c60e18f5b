import type { Embedding } from "./embedding.js";

/**
 * One search hit.
 */
export interface EmbeddingMatch<Embedded> {
  /** Relevance in [0, 1], higher is closer */
  score: number;
  embeddingId: string;
  embedding: Embedding;
  /** Original content, when it was stored */
  embedded?: Embedded;
}

/**
 * Stores embeddings (optionally with their content) and finds the ones
 * closest to a reference embedding.
 */
export interface EmbeddingStore<Embedded> {
  /**
   * Store an embedding under a generated id.
   *
   * @returns the generated id
   */
  add(embedding: Embedding): Promise<string>;
  addWithId(id: string, embedding: Embedding): Promise<void>;
  addWithContent(embedding: Embedding, embedded: Embedded): Promise<string>;
  /**
   * @returns generated ids, in input order
   */
  addAll(embeddings: Embedding[]): Promise<string[]>;
  /**
   * `embeddings` and `embedded` must have the same length.
   */
  addAllWithContent(embeddings: Embedding[], embedded: Embedded[]): Promise<string[]>;
  /**
   * Up to `maxResults` matches with a score of at least `minScore` (default
   * 0), best first.
   */
  findRelevant(
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore?: number
  ): Promise<EmbeddingMatch<Embedded>[]>;
  /**
   * Like {@link findRelevant}, restricted to the entries of one memory.
   */
  findRelevantForMemory(
    memoryId: string,
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore?: number
  ): Promise<EmbeddingMatch<Embedded>[]>;
}

/**
 * Map cosine similarity in [-1, 1] to a relevance score in [0, 1].
 */
export function relevanceScoreFromCosineSimilarity(cosineSimilarity: number): number {
  return (cosineSimilarity + 1) / 2;
}

/**
 * Best-first order, ties keep their input order.
 */
export function sortByScore<Embedded>(matches: EmbeddingMatch<Embedded>[]): EmbeddingMatch<Embedded>[] {
  return [...matches].sort((a, b) => b.score - a.score);
}
