import { z } from "zod";

// ============================================
// Adapter Configuration Schemas
// ============================================

export const AzureOpenAiConfigSchema = z.object({
  endpoint: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  /** Plain OpenAI key; switches the adapter to api.openai.com */
  nonAzureApiKey: z.string().min(1).optional(),
  serviceVersion: z.string().optional(),
  deploymentName: z.string().default("gpt-35-turbo"),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  timeout: z.number().int().positive().default(60_000),
  maxRetries: z.number().int().min(0).default(3),
  logRequestsAndResponses: z.boolean().default(false),
});

export type AzureOpenAiConfig = z.infer<typeof AzureOpenAiConfigSchema>;

export const OllamaConfigSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:11434"),
  modelName: z.string().optional(),
  embeddingModelName: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  timeout: z.number().int().positive().default(60_000),
  maxRetries: z.number().int().min(0).default(3),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;

export const PineconeConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  index: z.string().optional(),
  namespace: z.string().optional(),
  /** Metadata key holding the segment text */
  metadataTextKey: z.string().default("text_segment"),
});

export type PineconeConfig = z.infer<typeof PineconeConfigSchema>;

// ============================================
// Log Level Schema
// ============================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

// ============================================
// Complete Configuration Schema
// ============================================

export const ConfigSchema = z.object({
  azureOpenAi: AzureOpenAiConfigSchema.default({}),
  ollama: OllamaConfigSchema.default({}),
  pinecone: PineconeConfigSchema.default({}),
  logLevel: LogLevelSchema.default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config as written by users, before defaults are applied.
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
