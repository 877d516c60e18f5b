/**
 * Streaming chat over Ollama's `/api/chat`.
 *
 * @module @tessera/ollama/streaming-chat-model
 */

import type {
  AiMessage,
  ChatMessage,
  FinishReason,
  ModelResponse,
  OllamaConfig,
  StreamingChatLanguageModel,
  StreamingResponseHandler,
  TokenUsage,
  ToolSpecification,
} from "@tessera/core";
import {
  aiMessage,
  Logger,
  type ModelCall,
  ModelCallLogger,
  modelResponse,
  providerError,
  resolveGenerateArguments,
  tokenUsage,
} from "@tessera/core";
import { ErrorCode } from "@tessera/shared";
import { OllamaClient, type OllamaClientOptions } from "./client.js";
import { type ChatRequest, type ChatResponse, type Message, message, type OllamaOptions, Role } from "./types.js";

export interface OllamaStreamingChatModelOptions extends OllamaClientOptions {
  modelName: string;
  temperature?: number;
  topK?: number;
  topP?: number;
  repeatPenalty?: number;
  seed?: number;
  numPredict?: number;
  stop?: string[];
  /** `json` to constrain output to JSON */
  format?: string;
  logRequestsAndResponses?: boolean;
  /** Used as is; connection options are then ignored */
  client?: OllamaClient;
}

export function toOllamaMessage(chatMessage: ChatMessage): Message {
  switch (chatMessage.type) {
    case "system":
      return message(Role.SYSTEM, chatMessage.text);
    case "user":
      return message(Role.USER, chatMessage.text);
    case "ai":
      return message(Role.ASSISTANT, chatMessage.text ?? "");
    case "tool_execution_result":
      return message(Role.TOOL, chatMessage.text);
  }
}

function finishReasonFrom(reason: string | undefined): FinishReason | undefined {
  switch (reason) {
    case "stop":
      return "stop";
    case "length":
      return "length";
    default:
      return undefined;
  }
}

function usageFrom(response: ChatResponse): TokenUsage | undefined {
  if (response.prompt_eval_count === undefined && response.eval_count === undefined) {
    return undefined;
  }
  return tokenUsage(response.prompt_eval_count, response.eval_count);
}

/**
 * {@link StreamingChatLanguageModel} for models served by Ollama. Tool
 * specifications are not supported.
 *
 * @example
 * ```typescript
 * const model = new OllamaStreamingChatModel({ modelName: "llama3", temperature: 0.2 });
 * await model.generate([userMessage("Why is the sky blue?")], handler);
 * ```
 */
export class OllamaStreamingChatModel implements StreamingChatLanguageModel {
  readonly modelName: string;
  private readonly client: OllamaClient;
  private readonly options: OllamaStreamingChatModelOptions;
  private readonly calls: ModelCallLogger;

  constructor(options: OllamaStreamingChatModelOptions) {
    this.options = options;
    this.modelName = options.modelName;
    this.client = options.client ?? new OllamaClient(options);
    this.calls = new ModelCallLogger(options.logger ?? Logger.silent(), {
      provider: "ollama",
      model: options.modelName,
      logRequestsAndResponses: options.logRequestsAndResponses,
    });
  }

  /**
   * Create a model from the `ollama` section of a loaded configuration.
   */
  static fromConfig(
    config: OllamaConfig,
    overrides: Partial<OllamaStreamingChatModelOptions> = {}
  ): OllamaStreamingChatModel {
    const modelName = overrides.modelName ?? config.modelName;
    if (!modelName) {
      throw providerError("Ollama model name is not configured", ErrorCode.PROVIDER_INITIALIZATION_FAILED, {
        provider: "ollama",
      });
    }
    return new OllamaStreamingChatModel({
      baseUrl: config.baseUrl,
      temperature: config.temperature,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      ...overrides,
      modelName,
    });
  }

  generate(messages: ChatMessage[], handler: StreamingResponseHandler<AiMessage>): Promise<void>;
  generate(
    messages: ChatMessage[],
    toolSpecifications: ToolSpecification[],
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<void>;
  async generate(
    messages: ChatMessage[],
    toolsOrHandler: ToolSpecification[] | StreamingResponseHandler<AiMessage>,
    handler?: StreamingResponseHandler<AiMessage>
  ): Promise<void> {
    const resolved = resolveGenerateArguments(toolsOrHandler, handler);
    if (resolved.toolSpecifications.length > 0) {
      resolved.handler.onError(this.toolsNotSupported());
      return;
    }
    await this.stream(messages, resolved.handler);
  }

  async generateForcingTool(
    _messages: ChatMessage[],
    _toolSpecification: ToolSpecification,
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<void> {
    handler.onError(this.toolsNotSupported());
  }

  private async stream(messages: ChatMessage[], handler: StreamingResponseHandler<AiMessage>): Promise<void> {
    const request = this.buildRequest(messages);
    const call = this.calls.start(request);
    let response: ModelResponse<AiMessage>;

    try {
      response = await this.collect(request, call, handler);
    } catch (error) {
      call.fail(error);
      handler.onError(error);
      return;
    }

    call.complete({
      inputTokens: response.tokenUsage?.inputTokenCount,
      outputTokens: response.tokenUsage?.outputTokenCount,
    });
    handler.onComplete(response);
  }

  /**
   * Forward tokens until the `done` chunk and build the response from it
   */
  private async collect(
    request: ChatRequest,
    call: ModelCall,
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<ModelResponse<AiMessage>> {
    let content = "";
    for await (const chunk of this.client.chatStream(request)) {
      call.chunk(chunk);
      const token = chunk.message?.content;
      if (token) {
        content += token;
        handler.onNext(token);
      }
      if (chunk.done) {
        return modelResponse(aiMessage(content), usageFrom(chunk), finishReasonFrom(chunk.done_reason));
      }
    }
    throw providerError("Ollama stream ended before completion", ErrorCode.NETWORK_ERROR, {
      provider: "ollama",
      model: this.modelName,
    });
  }

  private buildRequest(messages: ChatMessage[]): ChatRequest {
    const request: ChatRequest = {
      model: this.modelName,
      messages: messages.map(toOllamaMessage),
    };

    const options: OllamaOptions = {};
    if (this.options.temperature !== undefined) {
      options.temperature = this.options.temperature;
    }
    if (this.options.topK !== undefined) {
      options.top_k = this.options.topK;
    }
    if (this.options.topP !== undefined) {
      options.top_p = this.options.topP;
    }
    if (this.options.repeatPenalty !== undefined) {
      options.repeat_penalty = this.options.repeatPenalty;
    }
    if (this.options.seed !== undefined) {
      options.seed = this.options.seed;
    }
    if (this.options.numPredict !== undefined) {
      options.num_predict = this.options.numPredict;
    }
    if (this.options.stop && this.options.stop.length > 0) {
      options.stop = this.options.stop;
    }
    if (Object.keys(options).length > 0) {
      request.options = options;
    }
    if (this.options.format !== undefined) {
      request.format = this.options.format;
    }

    return request;
  }

  private toolsNotSupported() {
    return providerError("Tool specifications are not supported by Ollama models", ErrorCode.NOT_IMPLEMENTED, {
      provider: "ollama",
      model: this.modelName,
    });
  }
}
