import * as fs from "node:fs";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@tessera/shared";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export interface LoadConfigOptions {
  /** Directory to start the config file search from (default: process.cwd()) */
  cwd?: string;
  /** Highest-priority values */
  overrides?: PartialConfig;
  /** Ignore TESSERA_* environment variables */
  skipEnv?: boolean;
  /** Do not look for tessera.toml */
  skipProjectFile?: boolean;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
}

/** Config file names, checked in this order in each directory */
const CONFIG_FILE_NAMES = ["tessera.toml", ".tessera.toml"];

/**
 * Find the nearest config file walking up from `startDir` to the file system
 * root.
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// Environment Variables
// ============================================

const ENV_MAPPINGS: Record<string, string[]> = {
  TESSERA_AZURE_OPENAI_ENDPOINT: ["azureOpenAi", "endpoint"],
  TESSERA_AZURE_OPENAI_API_KEY: ["azureOpenAi", "apiKey"],
  TESSERA_AZURE_OPENAI_SERVICE_VERSION: ["azureOpenAi", "serviceVersion"],
  TESSERA_AZURE_OPENAI_DEPLOYMENT_NAME: ["azureOpenAi", "deploymentName"],
  TESSERA_OPENAI_API_KEY: ["azureOpenAi", "nonAzureApiKey"],
  TESSERA_OLLAMA_BASE_URL: ["ollama", "baseUrl"],
  TESSERA_OLLAMA_MODEL_NAME: ["ollama", "modelName"],
  TESSERA_PINECONE_API_KEY: ["pinecone", "apiKey"],
  TESSERA_PINECONE_INDEX: ["pinecone", "index"],
  TESSERA_PINECONE_NAMESPACE: ["pinecone", "namespace"],
  TESSERA_LOG_LEVEL: ["logLevel"],
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

function setNestedValue(target: Record<string, unknown>, keys: string[], value: unknown): void {
  const [head, ...rest] = keys;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  target[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Collect TESSERA_* variables into a nested partial config.
 *
 * @example
 * ```typescript
 * // TESSERA_OLLAMA_BASE_URL=http://gpu-box:11434
 * parseEnvConfig();
 * // { ollama: { baseUrl: "http://gpu-box:11434" } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, keys] of Object.entries(ENV_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      setNestedValue(result, keys, value);
    }
  }
  return result;
}

/**
 * Deep merge plain objects; later sources win. Arrays are replaced and
 * `undefined` never overwrites.
 */
export function deepMerge(...sources: unknown[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? deepMerge(targetValue, sourceValue)
          : sourceValue;
    }
  }

  return result;
}

function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Err({ code: "FILE_NOT_FOUND", message: `Config file not found: ${filePath}`, path: filePath });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration. Later sources override earlier ones:
 *
 * 1. Schema defaults
 * 2. `tessera.toml` (nearest one up from `cwd`)
 * 3. TESSERA_* environment variables
 * 4. `overrides`
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/srv/rag" });
 * if (result.ok) {
 *   const model = AzureOpenAiStreamingChatModel.builder().fromConfig(result.value.azureOpenAi).build();
 * } else {
 *   logger.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false, env = process.env } = options;
  const sources: unknown[] = [];
  let sourcePath: string | undefined;

  if (!skipProjectFile) {
    sourcePath = findProjectConfig(cwd);
    if (sourcePath) {
      const fileResult = readTomlFile(sourcePath);
      if (!fileResult.ok) {
        return fileResult;
      }
      sources.push(fileResult.value);
    }
  }

  if (!skipEnv) {
    sources.push(parseEnvConfig(env));
  }

  if (overrides) {
    sources.push(overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...sources));
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      path: sourcePath,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
