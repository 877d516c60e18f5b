export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export type { ModelCallLoggerOptions } from "./model-logger.js";
export { ModelCall, ModelCallLogger } from "./model-logger.js";
export type { SanitizeOptions } from "./sanitize.js";
export { sanitizeData, serializeError } from "./sanitize.js";
export type { ConsoleTransportOptions, JsonTransportOptions } from "./transports/index.js";
export {
  ConsoleTransport,
  JsonTransport,
  MemoryTransport,
  shouldEnableColors,
} from "./transports/index.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
export { isLogLevel, LOG_LEVEL_PRIORITY, LOG_LEVELS } from "./types.js";
