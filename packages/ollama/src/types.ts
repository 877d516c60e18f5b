/**
 * Ollama REST API shapes.
 *
 * @module @tessera/ollama/types
 * @see https://github.com/ollama/ollama/blob/main/docs/api.md
 */

import { z } from "zod";

// =============================================================================
// Messages
// =============================================================================

export const Role = {
  SYSTEM: "system",
  USER: "user",
  ASSISTANT: "assistant",
  TOOL: "tool",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export interface Message {
  role: Role;
  content: string;
}

export function message(role: Role, content: string): Message {
  return { role, content };
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Model parameters, named as Ollama names them.
 */
export interface OllamaOptions {
  temperature?: number;
  top_k?: number;
  top_p?: number;
  repeat_penalty?: number;
  seed?: number;
  num_predict?: number;
  stop?: string[];
}

export interface ChatRequest {
  model: string;
  messages: Message[];
  options?: OllamaOptions;
  /** `json` to constrain output to JSON */
  format?: string;
  keep_alive?: string;
}

export interface EmbedRequest {
  model: string;
  input: string[];
  options?: OllamaOptions;
  keep_alive?: string;
}

// =============================================================================
// Responses
// =============================================================================

export const ChatResponseSchema = z.object({
  model: z.string().optional(),
  created_at: z.string().optional(),
  message: z
    .object({
      role: z.string(),
      content: z.string().default(""),
    })
    .optional(),
  done: z.boolean().default(false),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().int().optional(),
  eval_count: z.number().int().optional(),
  total_duration: z.number().optional(),
  /** Set instead of the other fields when generation fails mid-stream */
  error: z.string().optional(),
});

export type ChatResponse = z.infer<typeof ChatResponseSchema>;

export const EmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
  prompt_eval_count: z.number().int().optional(),
});

export type EmbedResponse = z.infer<typeof EmbedResponseSchema>;
