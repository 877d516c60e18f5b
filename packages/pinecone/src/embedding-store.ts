/**
 * Pinecone-backed embedding store.
 *
 * @module @tessera/pinecone/embedding-store
 */

import { Pinecone, type PineconeRecord, type RecordMetadata } from "@pinecone-database/pinecone";
import {
  BaseEmbeddingStore,
  createProviderError,
  Embedding,
  type EmbeddingMatch,
  type EmbeddingRecord,
  Logger,
  type PineconeConfig,
  providerError,
  relevanceScoreFromCosineSimilarity,
  sortByScore,
  type TextSegment,
  textSegment,
  toMetadata,
  withProviderRetry,
} from "@tessera/core";
import { ErrorCode } from "@tessera/shared";

export const DEFAULT_METADATA_TEXT_KEY = "text_segment";

/**
 * Vector search request, a subset of the SDK's query options.
 */
export interface VectorQuery {
  vector: number[];
  topK: number;
  includeMetadata: boolean;
  includeValues: boolean;
}

export interface VectorMatch {
  id: string;
  score?: number;
  values?: number[];
  metadata?: RecordMetadata;
}

/**
 * The part of the SDK's `Index` the store uses.
 */
export interface PineconeIndex {
  namespace(namespace: string): PineconeIndex;
  upsert(records: PineconeRecord<RecordMetadata>[]): Promise<void>;
  query(query: VectorQuery): Promise<{ matches: VectorMatch[] }>;
}

export interface PineconeEmbeddingStoreOptions {
  /** Index name */
  index: string;
  apiKey?: string;
  /** Namespace for reads and writes (default: the index's default namespace) */
  namespace?: string;
  /** Metadata key holding the segment text */
  metadataTextKey?: string;
  maxRetries?: number;
  /** Upper bound for the delay between retries (default: 60000) */
  maxRetryDelayMs?: number;
  logger?: Logger;
  /** Pre-built index handle; `apiKey` is then ignored */
  pineconeIndex?: PineconeIndex;
}

/**
 * {@link EmbeddingStore} over a Pinecone index. Scores are cosine similarity
 * mapped to [0, 1]; memory-scoped searches query the namespace named after the
 * memory id.
 *
 * @example
 * ```typescript
 * const store = new PineconeEmbeddingStore({ apiKey: process.env.PINECONE_API_KEY, index: "docs" });
 * const id = await store.addWithContent(embedding, textSegment("Paris is in France"));
 * const matches = await store.findRelevant(queryEmbedding, 5, 0.7);
 * ```
 */
export class PineconeEmbeddingStore extends BaseEmbeddingStore<TextSegment> {
  readonly indexName: string;
  readonly namespace: string;
  private readonly index: PineconeIndex;
  private readonly options: PineconeEmbeddingStoreOptions;
  private readonly metadataTextKey: string;
  private readonly logger: Logger;

  constructor(options: PineconeEmbeddingStoreOptions) {
    super();
    this.options = options;
    this.indexName = options.index;
    this.namespace = options.namespace ?? "";
    this.metadataTextKey = options.metadataTextKey ?? DEFAULT_METADATA_TEXT_KEY;
    this.logger = (options.logger ?? Logger.silent()).child({ provider: "pinecone", index: options.index });
    this.index = options.pineconeIndex ?? connect(options);
  }

  static fromConfig(
    config: PineconeConfig,
    overrides: Partial<PineconeEmbeddingStoreOptions> = {}
  ): PineconeEmbeddingStore {
    const index = overrides.index ?? config.index;
    if (!index) {
      throw providerError("Pinecone index is not configured", ErrorCode.PROVIDER_INITIALIZATION_FAILED, {
        provider: "pinecone",
      });
    }
    return new PineconeEmbeddingStore({
      apiKey: config.apiKey,
      namespace: config.namespace,
      metadataTextKey: config.metadataTextKey,
      ...overrides,
      index,
    });
  }

  /**
   * A store on the same index that reads and writes `namespace`.
   */
  withNamespace(namespace: string): PineconeEmbeddingStore {
    return new PineconeEmbeddingStore({ ...this.options, namespace, pineconeIndex: this.index });
  }

  protected async upsert(records: EmbeddingRecord<TextSegment>[]): Promise<void> {
    const vectors = records.map((record) => this.toPineconeRecord(record));
    await this.call("upsert", () => this.index.namespace(this.namespace).upsert(vectors));
    this.logger.debug("Upserted vectors", { namespace: this.namespace, count: vectors.length });
  }

  protected async query(
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore: number
  ): Promise<EmbeddingMatch<TextSegment>[]> {
    return this.queryNamespace(this.namespace, referenceEmbedding, maxResults, minScore);
  }

  protected async queryMemory(
    memoryId: string,
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore: number
  ): Promise<EmbeddingMatch<TextSegment>[]> {
    return this.queryNamespace(memoryId, referenceEmbedding, maxResults, minScore);
  }

  private async queryNamespace(
    namespace: string,
    referenceEmbedding: Embedding,
    maxResults: number,
    minScore: number
  ): Promise<EmbeddingMatch<TextSegment>[]> {
    const response = await this.call("query", () =>
      this.index.namespace(namespace).query({
        vector: referenceEmbedding.vector,
        topK: maxResults,
        includeMetadata: true,
        includeValues: true,
      })
    );

    const matches = response.matches
      .map((match) => this.toEmbeddingMatch(match))
      .filter((match) => match.score >= minScore);
    this.logger.debug("Queried vectors", { namespace, returned: response.matches.length, kept: matches.length });
    return sortByScore(matches);
  }

  private toPineconeRecord(record: EmbeddingRecord<TextSegment>): PineconeRecord<RecordMetadata> {
    if (!record.embedded) {
      return { id: record.id, values: record.embedding.vector };
    }
    return {
      id: record.id,
      values: record.embedding.vector,
      metadata: { ...record.embedded.metadata, [this.metadataTextKey]: record.embedded.text },
    };
  }

  private toEmbeddingMatch(match: VectorMatch): EmbeddingMatch<TextSegment> {
    const result: EmbeddingMatch<TextSegment> = {
      score: relevanceScoreFromCosineSimilarity(match.score ?? 0),
      embeddingId: match.id,
      embedding: new Embedding(match.values ?? []),
    };

    const metadata: RecordMetadata = match.metadata ?? {};
    const { [this.metadataTextKey]: text, ...rest } = metadata;
    if (typeof text === "string") {
      result.embedded = textSegment(text, toMetadata(rest));
    }
    return result;
  }

  /**
   * Run an SDK call with retries, converting failures to ProviderErrors
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withProviderRetry(
      async () => {
        try {
          return await fn();
        } catch (error) {
          throw createProviderError(error, {
            provider: "pinecone",
            metadata: { index: this.indexName, operation },
          });
        }
      },
      {
        maxRetries: this.options.maxRetries ?? 3,
        maxDelayMs: this.options.maxRetryDelayMs,
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn("Retrying Pinecone request", {
            operation,
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      }
    );
  }
}

function connect(options: PineconeEmbeddingStoreOptions): PineconeIndex {
  if (!options.apiKey) {
    throw providerError("Pinecone API key is required", ErrorCode.PROVIDER_INITIALIZATION_FAILED, {
      provider: "pinecone",
    });
  }
  return new Pinecone({ apiKey: options.apiKey }).index<RecordMetadata>(options.index);
}
