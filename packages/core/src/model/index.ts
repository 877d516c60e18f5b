export type {
  AiMessage,
  ChatMessage,
  ChatMessageType,
  SystemMessage,
  ToolExecutionResultMessage,
  UserMessage,
} from "./messages.js";
export {
  aiMessage,
  hasToolExecutionRequests,
  messageText,
  systemMessage,
  toolExecutionResultMessage,
  userMessage,
} from "./messages.js";
export type { FinishReason, ModelResponse, TokenUsage } from "./output.js";
export { addTokenUsage, modelResponse, tokenUsage } from "./output.js";
export type {
  StreamingChatLanguageModel,
  StreamingResponseHandler,
  TokenCountEstimator,
} from "./streaming.js";
export { resolveGenerateArguments } from "./streaming.js";
export type { Tokenizer } from "./tokenizer.js";
export type {
  JsonSchemaProperty,
  ToolExecutionRequest,
  ToolParameters,
  ToolSpecification,
} from "./tools.js";
export { toolParameters } from "./tools.js";
