// ============================================
// Tessera Core
// ============================================

/**
 * @module @tessera/core
 *
 * Vendor-neutral data model and interfaces for chat models, embedding models,
 * embedding stores and tokenizers, plus the shared error handling, retry,
 * logging, configuration and document loading used by every adapter.
 */

// ============================================
// Configuration
// ============================================
export * from "./config/index.js";

// ============================================
// Documents
// ============================================
export * from "./documents/index.js";

// ============================================
// Embeddings and Stores
// ============================================
export * from "./embedding/index.js";

// ============================================
// Errors
// ============================================
export * from "./errors/index.js";

// ============================================
// Logging
// ============================================
export * from "./logger/index.js";

// ============================================
// Chat Model Types
// ============================================
export * from "./model/index.js";

// ============================================
// Retry
// ============================================
export * from "./retry/index.js";
