/**
 * @module @tessera/pinecone
 *
 * Embedding store on Pinecone.
 */

export type {
  PineconeEmbeddingStoreOptions,
  PineconeIndex,
  VectorMatch,
  VectorQuery,
} from "./embedding-store.js";
export { DEFAULT_METADATA_TEXT_KEY, PineconeEmbeddingStore } from "./embedding-store.js";
