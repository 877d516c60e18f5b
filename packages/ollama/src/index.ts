/**
 * @module @tessera/ollama
 *
 * Streaming chat and embeddings for models served by Ollama.
 */

export type { OllamaClientOptions } from "./client.js";
export { DEFAULT_BASE_URL, OllamaClient } from "./client.js";
export type { OllamaEmbeddingModelOptions } from "./embedding-model.js";
export { OllamaEmbeddingModel } from "./embedding-model.js";
export { readLines } from "./ndjson.js";
export type { OllamaStreamingChatModelOptions } from "./streaming-chat-model.js";
export { OllamaStreamingChatModel, toOllamaMessage } from "./streaming-chat-model.js";
export type {
  ChatRequest,
  ChatResponse,
  EmbedRequest,
  EmbedResponse,
  Message,
  OllamaOptions,
} from "./types.js";
export { ChatResponseSchema, EmbedResponseSchema, message, Role } from "./types.js";
