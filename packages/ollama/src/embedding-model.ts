/**
 * Embeddings through Ollama's `/api/embed`.
 *
 * @module @tessera/ollama/embedding-model
 */

import {
  BaseEmbeddingModel,
  Embedding,
  type ModelResponse,
  modelResponse,
  type OllamaConfig,
  providerError,
  type TextSegment,
  tokenUsage,
} from "@tessera/core";
import { ErrorCode } from "@tessera/shared";
import { OllamaClient, type OllamaClientOptions } from "./client.js";

export interface OllamaEmbeddingModelOptions extends OllamaClientOptions {
  modelName: string;
  /** Used as is; connection options are then ignored */
  client?: OllamaClient;
}

export class OllamaEmbeddingModel extends BaseEmbeddingModel {
  readonly modelName: string;
  private readonly client: OllamaClient;

  constructor(options: OllamaEmbeddingModelOptions) {
    super();
    this.modelName = options.modelName;
    this.client = options.client ?? new OllamaClient(options);
  }

  /**
   * Uses `embeddingModelName`, falling back to `modelName`.
   */
  static fromConfig(
    config: OllamaConfig,
    overrides: Partial<OllamaEmbeddingModelOptions> = {}
  ): OllamaEmbeddingModel {
    const modelName = overrides.modelName ?? config.embeddingModelName ?? config.modelName;
    if (!modelName) {
      throw providerError(
        "Ollama embedding model name is not configured",
        ErrorCode.PROVIDER_INITIALIZATION_FAILED,
        { provider: "ollama" }
      );
    }
    return new OllamaEmbeddingModel({
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      ...overrides,
      modelName,
    });
  }

  async embedAll(segments: TextSegment[]): Promise<ModelResponse<Embedding[]>> {
    if (segments.length === 0) {
      return modelResponse([]);
    }

    const response = await this.client.embed({
      model: this.modelName,
      input: segments.map((segment) => segment.text),
    });

    if (response.embeddings.length !== segments.length) {
      throw providerError(
        `Ollama returned ${response.embeddings.length} embeddings for ${segments.length} inputs`,
        ErrorCode.API_ERROR,
        { provider: "ollama", model: this.modelName }
      );
    }

    return modelResponse(
      response.embeddings.map((vector) => new Embedding(vector)),
      response.prompt_eval_count === undefined ? undefined : tokenUsage(response.prompt_eval_count)
    );
  }
}
