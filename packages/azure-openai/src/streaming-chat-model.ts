/**
 * Streaming chat model backed by Azure OpenAI (or api.openai.com).
 *
 * @module @tessera/azure-openai/streaming-chat-model
 */

import type { TokenCredential } from "@azure/identity";
import type {
  AiMessage,
  AzureOpenAiConfig,
  ChatMessage,
  ModelResponse,
  StreamingChatLanguageModel,
  StreamingResponseHandler,
  TokenCountEstimator,
  Tokenizer,
  ToolSpecification,
} from "@tessera/core";
import {
  createProviderError,
  Logger,
  ModelCallLogger,
  resolveGenerateArguments,
} from "@tessera/core";
import { ErrorCode, TesseraError } from "@tessera/shared";
import { APIError } from "openai";
import type { ChatCompletionCreateParamsStreaming } from "openai/resources/chat/completions";
import {
  type ChatCompletionsClient,
  type ChatCompletionsClientOptions,
  createChatCompletionsClient,
} from "./client.js";
import { toOpenAiMessages, toOpenAiTools, toToolChoice } from "./mappers.js";
import { AzureOpenAiModelName } from "./model-name.js";
import { AzureOpenAiStreamingResponseBuilder } from "./streaming-response-builder.js";
import { OpenAiTokenizer } from "./tokenizer.js";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_DEPLOYMENT_NAME = "gpt-35-turbo";
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 3;

const PROVIDER = "azure-openai";

// =============================================================================
// Options
// =============================================================================

export interface AzureOpenAiStreamingChatModelOptions extends ChatCompletionsClientOptions {
  /** Token estimation; `null` disables estimates */
  tokenizer?: Tokenizer | null;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stop?: string[];
  presencePenalty?: number;
  frequencyPenalty?: number;
  logRequestsAndResponses?: boolean;
  logger?: Logger;
  /** Used as is; connection options are then ignored */
  client?: ChatCompletionsClient;
}

// =============================================================================
// Model
// =============================================================================

/**
 * {@link StreamingChatLanguageModel} over the Azure OpenAI chat completions API.
 *
 * @example
 * ```typescript
 * const model = AzureOpenAiStreamingChatModel.builder()
 *   .endpoint("https://my-resource.openai.azure.com")
 *   .apiKey(process.env.AZURE_OPENAI_KEY)
 *   .deploymentName("gpt-4o")
 *   .tokenizer(new OpenAiTokenizer(AzureOpenAiModelName.GPT_4O))
 *   .build();
 *
 * await model.generate([userMessage("Hello")], {
 *   onNext: (token) => process.stdout.write(token),
 *   onComplete: (response) => console.log(response.tokenUsage),
 *   onError: (error) => console.error(error),
 * });
 * ```
 */
export class AzureOpenAiStreamingChatModel
  implements StreamingChatLanguageModel, TokenCountEstimator
{
  private readonly client: ChatCompletionsClient;
  private readonly tokenizer: Tokenizer | undefined;
  private readonly deploymentName: string;
  private readonly options: AzureOpenAiStreamingChatModelOptions;
  private readonly calls: ModelCallLogger;

  constructor(options: AzureOpenAiStreamingChatModelOptions = {}) {
    this.options = options;
    this.deploymentName = options.deploymentName ?? DEFAULT_DEPLOYMENT_NAME;
    this.tokenizer =
      options.tokenizer === null
        ? undefined
        : (options.tokenizer ?? new OpenAiTokenizer(AzureOpenAiModelName.GPT_3_5_TURBO));
    this.client =
      options.client ??
      createChatCompletionsClient({
        ...options,
        deploymentName: this.deploymentName,
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
        maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      });
    this.calls = new ModelCallLogger(options.logger ?? Logger.silent(), {
      provider: PROVIDER,
      model: this.deploymentName,
      logRequestsAndResponses: options.logRequestsAndResponses,
    });
  }

  static builder(): AzureOpenAiStreamingChatModelBuilder {
    return new AzureOpenAiStreamingChatModelBuilder();
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
    await this.stream(messages, resolved.toolSpecifications, undefined, resolved.handler);
  }

  async generateForcingTool(
    messages: ChatMessage[],
    toolSpecification: ToolSpecification,
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<void> {
    await this.stream(messages, [toolSpecification], toolSpecification, handler);
  }

  /**
   * Input token estimate for `messages`, using the configured tokenizer.
   *
   * @throws TesseraError with `NOT_IMPLEMENTED` when estimates are disabled
   */
  estimateTokenCount(messages: ChatMessage[]): number {
    if (!this.tokenizer) {
      throw new TesseraError(
        "Token estimates are disabled for this model",
        ErrorCode.NOT_IMPLEMENTED
      );
    }
    return this.tokenizer.estimateTokenCountInMessages(messages);
  }

  private async stream(
    messages: ChatMessage[],
    toolSpecifications: ToolSpecification[],
    forcedTool: ToolSpecification | undefined,
    handler: StreamingResponseHandler<AiMessage>
  ): Promise<void> {
    const request = this.buildStreamingRequest(messages, toolSpecifications, forcedTool);
    const call = this.calls.start(request);
    let response: ModelResponse<AiMessage>;

    try {
      const builder = new AzureOpenAiStreamingResponseBuilder(
        this.estimateInputTokens(messages, toolSpecifications, forcedTool)
      );

      const stream = await this.client.streamChatCompletions(request);
      for await (const chunk of stream) {
        call.chunk(chunk);
        builder.append(chunk);
        const token = chunk.choices[0]?.delta.content;
        if (token) {
          handler.onNext(token);
        }
      }

      response = builder.build(this.tokenizer, forcedTool !== undefined);
    } catch (error) {
      const wrapped = this.handleError(error);
      call.fail(wrapped);
      handler.onError(wrapped);
      return;
    }

    call.complete({
      inputTokens: response.tokenUsage?.inputTokenCount,
      outputTokens: response.tokenUsage?.outputTokenCount,
    });
    handler.onComplete(response);
  }

  /**
   * Build the streaming chat completions request
   */
  private buildStreamingRequest(
    messages: ChatMessage[],
    toolSpecifications: ToolSpecification[],
    forcedTool: ToolSpecification | undefined
  ): ChatCompletionCreateParamsStreaming {
    const request: ChatCompletionCreateParamsStreaming = {
      model: this.deploymentName,
      messages: toOpenAiMessages(messages),
      stream: true,
      stream_options: { include_usage: true },
      temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
    };

    if (this.options.topP !== undefined) {
      request.top_p = this.options.topP;
    }
    if (this.options.maxTokens !== undefined) {
      request.max_tokens = this.options.maxTokens;
    }
    if (this.options.presencePenalty !== undefined) {
      request.presence_penalty = this.options.presencePenalty;
    }
    if (this.options.frequencyPenalty !== undefined) {
      request.frequency_penalty = this.options.frequencyPenalty;
    }
    if (this.options.stop && this.options.stop.length > 0) {
      request.stop = this.options.stop;
    }
    if (toolSpecifications.length > 0) {
      request.tools = toOpenAiTools(toolSpecifications);
    }
    if (forcedTool) {
      request.tool_choice = toToolChoice(forcedTool);
    }

    return request;
  }

  private estimateInputTokens(
    messages: ChatMessage[],
    toolSpecifications: ToolSpecification[],
    forcedTool: ToolSpecification | undefined
  ): number | undefined {
    if (!this.tokenizer) {
      return undefined;
    }

    let inputTokenCount = this.tokenizer.estimateTokenCountInMessages(messages);
    if (forcedTool) {
      inputTokenCount += this.tokenizer.estimateTokenCountInForcefulToolSpecification(forcedTool);
    } else if (toolSpecifications.length > 0) {
      inputTokenCount += this.tokenizer.estimateTokenCountInToolSpecifications(toolSpecifications);
    }
    return inputTokenCount;
  }

  /**
   * SDK errors become ProviderErrors; anything else reaches the handler as thrown
   */
  private handleError(error: unknown): unknown {
    if (error instanceof APIError) {
      return createProviderError(error, { provider: PROVIDER, model: this.deploymentName });
    }
    return error;
  }
}

// =============================================================================
// Builder
// =============================================================================

export class AzureOpenAiStreamingChatModelBuilder {
  private readonly options: AzureOpenAiStreamingChatModelOptions = {};
  private configured: AzureOpenAiStreamingChatModelOptions = {};

  endpoint(endpoint: string): this {
    this.options.endpoint = endpoint;
    return this;
  }

  serviceVersion(serviceVersion: string): this {
    this.options.serviceVersion = serviceVersion;
    return this;
  }

  apiKey(apiKey: string | undefined): this {
    this.options.apiKey = apiKey;
    return this;
  }

  nonAzureApiKey(nonAzureApiKey: string | undefined): this {
    this.options.nonAzureApiKey = nonAzureApiKey;
    return this;
  }

  tokenCredential(tokenCredential: TokenCredential): this {
    this.options.tokenCredential = tokenCredential;
    return this;
  }

  deploymentName(deploymentName: string): this {
    this.options.deploymentName = deploymentName;
    return this;
  }

  tokenizer(tokenizer: Tokenizer | null): this {
    this.options.tokenizer = tokenizer;
    return this;
  }

  temperature(temperature: number): this {
    this.options.temperature = temperature;
    return this;
  }

  topP(topP: number): this {
    this.options.topP = topP;
    return this;
  }

  maxTokens(maxTokens: number): this {
    this.options.maxTokens = maxTokens;
    return this;
  }

  stop(stop: string[]): this {
    this.options.stop = stop;
    return this;
  }

  presencePenalty(presencePenalty: number): this {
    this.options.presencePenalty = presencePenalty;
    return this;
  }

  frequencyPenalty(frequencyPenalty: number): this {
    this.options.frequencyPenalty = frequencyPenalty;
    return this;
  }

  timeout(timeoutMs: number): this {
    this.options.timeout = timeoutMs;
    return this;
  }

  maxRetries(maxRetries: number): this {
    this.options.maxRetries = maxRetries;
    return this;
  }

  logRequestsAndResponses(enabled: boolean): this {
    this.options.logRequestsAndResponses = enabled;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  client(client: ChatCompletionsClient): this {
    this.options.client = client;
    return this;
  }

  /**
   * Apply the `azureOpenAi` section of a loaded configuration. Values set
   * through the other builder methods win, whichever is called first.
   */
  fromConfig(config: AzureOpenAiConfig): this {
    this.configured = definedOptions({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      nonAzureApiKey: config.nonAzureApiKey,
      serviceVersion: config.serviceVersion,
      deploymentName: config.deploymentName,
      temperature: config.temperature,
      topP: config.topP,
      maxTokens: config.maxTokens,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      logRequestsAndResponses: config.logRequestsAndResponses,
    });
    return this;
  }

  build(): AzureOpenAiStreamingChatModel {
    return new AzureOpenAiStreamingChatModel({
      ...this.configured,
      ...definedOptions(this.options),
    });
  }
}

function definedOptions(
  options: AzureOpenAiStreamingChatModelOptions
): AzureOpenAiStreamingChatModelOptions {
  const defined: AzureOpenAiStreamingChatModelOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(defined, { [key]: value });
    }
  }
  return defined;
}
