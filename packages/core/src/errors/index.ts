export {
  classifyHttpStatus,
  classifyProviderError,
  createProviderError,
  extractRetryAfter,
  getErrorMessage,
  getRetryDelay,
  isRetryable,
} from "./classify.js";
export type {
  ErrorClassification,
  ProviderErrorCategory,
  ProviderErrorContext,
  ProviderErrorOptions,
} from "./provider-error.js";
export { ProviderError, providerError } from "./provider-error.js";
