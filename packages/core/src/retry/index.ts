export type { RetryOptions } from "./retry.js";
export { withProviderRetry } from "./retry.js";
