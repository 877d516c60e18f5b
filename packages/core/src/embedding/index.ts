export type { EmbeddingRecord } from "./base-embedding-store.js";
export { BaseEmbeddingStore } from "./base-embedding-store.js";
export { Embedding } from "./embedding.js";
export type { EmbeddingModel } from "./embedding-model.js";
export { BaseEmbeddingModel } from "./embedding-model.js";
export type { EmbeddingMatch, EmbeddingStore } from "./embedding-store.js";
export { relevanceScoreFromCosineSimilarity, sortByScore } from "./embedding-store.js";
export type { Metadata, MetadataValue, TextSegment } from "./text-segment.js";
export { isMetadataValue, textSegment, toMetadata } from "./text-segment.js";
