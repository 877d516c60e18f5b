export type { ConfigError, ConfigErrorCode, LoadConfigOptions } from "./loader.js";
export { deepMerge, findProjectConfig, loadConfig, parseEnvConfig } from "./loader.js";
export type { AzureOpenAiConfig, Config, OllamaConfig, PartialConfig, PineconeConfig } from "./schema.js";
export {
  AzureOpenAiConfigSchema,
  ConfigSchema,
  LogLevelSchema,
  OllamaConfigSchema,
  PineconeConfigSchema,
} from "./schema.js";
