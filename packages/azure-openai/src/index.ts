/**
 * @module @tessera/azure-openai
 *
 * Streaming chat over Azure OpenAI, with OpenAI token estimation.
 */

// =============================================================================
// Client
// =============================================================================
export type { ChatCompletionsClient, ChatCompletionsClientOptions } from "./client.js";
export {
  COGNITIVE_SERVICES_SCOPE,
  createChatCompletionsClient,
  DEFAULT_SERVICE_VERSION,
  OPENAI_BASE_URL,
  wrapOpenAiClient,
} from "./client.js";

// =============================================================================
// Mappers
// =============================================================================
export {
  finishReasonFrom,
  tokenUsageFrom,
  toOpenAiMessage,
  toOpenAiMessages,
  toOpenAiTool,
  toOpenAiTools,
  toToolChoice,
} from "./mappers.js";

// =============================================================================
// Models
// =============================================================================
export { AzureOpenAiModelName } from "./model-name.js";
export type { AzureOpenAiStreamingChatModelOptions } from "./streaming-chat-model.js";
export {
  AzureOpenAiStreamingChatModel,
  AzureOpenAiStreamingChatModelBuilder,
  DEFAULT_DEPLOYMENT_NAME,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from "./streaming-chat-model.js";
export { AzureOpenAiStreamingResponseBuilder } from "./streaming-response-builder.js";

// =============================================================================
// Tokenizer
// =============================================================================
export type { OpenAiTokenizerOptions, TokenEncoder } from "./tokenizer.js";
export { OpenAiTokenizer } from "./tokenizer.js";
