/**
 * Token estimation for OpenAI chat models.
 *
 * Counts come from the model's BPE encoding (js-tiktoken). Message and tool
 * overheads follow the constants OpenAI's chat format adds around content:
 * see "How to count tokens with tiktoken" in the OpenAI cookbook.
 *
 * @module @tessera/azure-openai/tokenizer
 */

import type {
  AiMessage,
  ChatMessage,
  JsonSchemaProperty,
  Tokenizer,
  ToolExecutionRequest,
  ToolParameters,
  ToolSpecification,
  UserMessage,
} from "@tessera/core";
import { getEncoding, type TiktokenEncoding } from "js-tiktoken";
import { AzureOpenAiModelName } from "./model-name.js";

/**
 * Anything that turns text into token ids.
 */
export interface TokenEncoder {
  encode(text: string): number[];
}

export interface OpenAiTokenizerOptions {
  /** Encoder to use instead of the model's tiktoken encoding */
  encoder?: TokenEncoder;
}

// "<|start|>assistant<|message|>" primes every reply
const REPLY_PRIMER_TOKENS = 3;

const encoders = new Map<TiktokenEncoding, TokenEncoder>();

function encodingForModel(modelName: string): TiktokenEncoding {
  return /^(gpt-4o|o1|o3)/.test(modelName) ? "o200k_base" : "cl100k_base";
}

function sharedEncoder(encoding: TiktokenEncoding): TokenEncoder {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parsed tool arguments; malformed or non-object JSON counts as no arguments.
 */
function parseArguments(json: string): Record<string, unknown> {
  if (json.trim().length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    if (error instanceof SyntaxError) {
      return {};
    }
    throw error;
  }
}

function argumentText(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * {@link Tokenizer} for OpenAI models, hosted by OpenAI or on Azure.
 *
 * @example
 * ```typescript
 * const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4O);
 * tokenizer.estimateTokenCountInMessages([userMessage("Hello world")]);
 * ```
 */
export class OpenAiTokenizer implements Tokenizer {
  readonly modelName: string;
  private readonly encoder: TokenEncoder;

  constructor(modelName: string = AzureOpenAiModelName.GPT_3_5_TURBO, options: OpenAiTokenizerOptions = {}) {
    this.modelName = modelName;
    this.encoder = options.encoder ?? sharedEncoder(encodingForModel(modelName));
  }

  estimateTokenCountInText(text: string): number {
    return this.encoder.encode(text).length;
  }

  estimateTokenCountInMessage(message: ChatMessage): number {
    let tokenCount = this.extraTokensPerMessage();
    tokenCount += this.estimateTokenCountInText(this.roleOf(message));

    switch (message.type) {
      case "system":
        tokenCount += this.estimateTokenCountInText(message.text);
        break;
      case "user":
        tokenCount += this.estimateTokenCountInUserMessage(message);
        break;
      case "ai":
        tokenCount += this.estimateTokenCountInAiMessage(message);
        break;
      case "tool_execution_result":
        tokenCount += this.estimateTokenCountInText(message.text);
        break;
    }

    return tokenCount;
  }

  estimateTokenCountInMessages(messages: readonly ChatMessage[]): number {
    let tokenCount = REPLY_PRIMER_TOKENS;
    for (const message of messages) {
      tokenCount += this.estimateTokenCountInMessage(message);
    }
    return tokenCount;
  }

  estimateTokenCountInToolSpecification(toolSpecification: ToolSpecification): number {
    return this.estimateTokenCountInToolSpecifications([toolSpecification]);
  }

  estimateTokenCountInToolSpecifications(toolSpecifications: readonly ToolSpecification[]): number {
    let tokenCount = 16;
    for (const toolSpecification of toolSpecifications) {
      tokenCount += 6;
      tokenCount += this.estimateTokenCountInText(toolSpecification.name);
      if (toolSpecification.description !== undefined) {
        tokenCount += 2;
        tokenCount += this.estimateTokenCountInText(toolSpecification.description);
      }
      tokenCount += this.estimateTokenCountInToolParameters(toolSpecification.parameters);
    }
    return tokenCount;
  }

  estimateTokenCountInForcefulToolSpecification(toolSpecification: ToolSpecification): number {
    let tokenCount = this.estimateTokenCountInToolSpecifications([toolSpecification]);
    tokenCount += 4;
    tokenCount += this.estimateTokenCountInText(toolSpecification.name);
    if (this.isOneOfLatestModels()) {
      tokenCount += 3;
    }
    return tokenCount;
  }

  estimateTokenCountInToolExecutionRequests(requests: readonly ToolExecutionRequest[]): number {
    let tokenCount = 0;
    let toolsWithArguments = 0;
    let toolsWithoutArguments = 0;
    let totalArguments = 0;

    for (const request of requests) {
      tokenCount += 4;
      tokenCount += this.estimateTokenCountInText(request.name);
      tokenCount += this.estimateTokenCountInText(request.arguments);

      const argumentCount = Object.keys(parseArguments(request.arguments)).length;
      if (argumentCount === 0) {
        toolsWithoutArguments++;
      } else {
        toolsWithArguments++;
      }
      totalArguments += argumentCount;
    }

    const toolCount = requests.length;
    if (this.modelName === AzureOpenAiModelName.GPT_3_5_TURBO_1106 || this.isOneOfLatestGpt4Models()) {
      tokenCount += 16;
      tokenCount += 3 * toolsWithoutArguments;
      tokenCount += toolCount;
      if (totalArguments > 0) {
        tokenCount -= 1;
        tokenCount -= 2 * totalArguments;
        tokenCount += 2 * toolsWithArguments;
        tokenCount += toolCount;
      }
    }

    if (this.modelName === AzureOpenAiModelName.GPT_4_1106_PREVIEW) {
      tokenCount += 3;
      if (toolCount > 1) {
        tokenCount += 18;
        tokenCount += 15 * toolCount;
        tokenCount += totalArguments;
        tokenCount -= 3 * toolsWithoutArguments;
      }
    }

    return tokenCount;
  }

  estimateTokenCountInForcefulToolExecutionRequest(request: ToolExecutionRequest): number {
    const argumentCount = Object.keys(parseArguments(request.arguments)).length;

    if (this.isOneOfLatestGpt4Models()) {
      return argumentCount === 0 ? 1 : this.estimateTokenCountInText(request.arguments);
    }

    let tokenCount = this.estimateTokenCountInToolExecutionRequests([request]);
    tokenCount -= 4;
    tokenCount -= this.estimateTokenCountInText(request.name);

    if (this.modelName === AzureOpenAiModelName.GPT_3_5_TURBO_1106) {
      if (argumentCount === 0) {
        return 1;
      }
      tokenCount -= 1;
      tokenCount -= 2 * argumentCount;
      tokenCount += 3;
    }

    return tokenCount;
  }

  private roleOf(message: ChatMessage): string {
    switch (message.type) {
      case "system":
        return "system";
      case "user":
        return "user";
      case "ai":
        return "assistant";
      case "tool_execution_result":
        return "tool";
    }
  }

  private estimateTokenCountInUserMessage(message: UserMessage): number {
    let tokenCount = this.estimateTokenCountInText(message.text);
    if (message.name !== undefined) {
      tokenCount += this.extraTokensPerName();
      tokenCount += this.estimateTokenCountInText(message.name);
    }
    return tokenCount;
  }

  private estimateTokenCountInAiMessage(message: AiMessage): number {
    let tokenCount = 0;
    if (message.text !== undefined) {
      tokenCount += this.estimateTokenCountInText(message.text);
    }

    const requests = message.toolExecutionRequests ?? [];
    const [single] = requests;
    if (requests.length === 0) {
      return tokenCount;
    }

    tokenCount += this.isOneOfLatestModels() ? 6 : 3;
    if (requests.length === 1 && single) {
      tokenCount -= 1;
      tokenCount += this.estimateTokenCountInText(single.name) * 2;
      tokenCount += this.estimateTokenCountInText(single.arguments);
      return tokenCount;
    }

    tokenCount += 15;
    for (const request of requests) {
      tokenCount += 7;
      tokenCount += this.estimateTokenCountInText(request.name);
      for (const [name, value] of Object.entries(parseArguments(request.arguments))) {
        tokenCount += 2;
        tokenCount += this.estimateTokenCountInText(name);
        tokenCount += this.estimateTokenCountInText(argumentText(value));
      }
    }
    return tokenCount;
  }

  private estimateTokenCountInToolParameters(parameters: ToolParameters | undefined): number {
    if (!parameters) {
      return 0;
    }

    const latest = this.isOneOfLatestModels();
    const properties = Object.entries(parameters.properties);
    let tokenCount = 3;
    if (latest) {
      tokenCount += properties.length - 1;
    }

    for (const [name, schema] of properties) {
      tokenCount += latest ? 2 : 3;
      tokenCount += this.estimateTokenCountInText(name);
      tokenCount += this.estimateTokenCountInProperty(schema, parameters.required.includes(name));
    }
    return tokenCount;
  }

  private estimateTokenCountInProperty(schema: JsonSchemaProperty, required: boolean): number {
    const latest = this.isOneOfLatestModels();
    let tokenCount = 0;

    for (const [key, value] of Object.entries(schema)) {
      if (key === "type") {
        if (value === "array" && latest) {
          tokenCount += 1;
        }
      } else if (key === "description") {
        tokenCount += 2;
        tokenCount += this.estimateTokenCountInText(argumentText(value));
        if (latest && required) {
          tokenCount += 1;
        }
      } else if (key === "enum" && Array.isArray(value)) {
        tokenCount -= latest ? 2 : 3;
        for (const option of value) {
          tokenCount += 3;
          tokenCount += this.estimateTokenCountInText(argumentText(option));
        }
      }
    }
    return tokenCount;
  }

  private extraTokensPerMessage(): number {
    return this.modelName === AzureOpenAiModelName.GPT_3_5_TURBO_0301 ? 4 : 3;
  }

  private extraTokensPerName(): number {
    return this.modelName === AzureOpenAiModelName.GPT_3_5_TURBO_0301 ? -1 : 1;
  }

  private isOneOfLatestGpt3Models(): boolean {
    return (
      this.modelName === AzureOpenAiModelName.GPT_3_5_TURBO ||
      this.modelName === AzureOpenAiModelName.GPT_3_5_TURBO_1106 ||
      this.modelName === "gpt-3.5-turbo-0125"
    );
  }

  private isOneOfLatestGpt4Models(): boolean {
    return (
      this.modelName === AzureOpenAiModelName.GPT_4_1106_PREVIEW ||
      this.modelName.startsWith(AzureOpenAiModelName.GPT_4_TURBO) ||
      this.modelName.startsWith(AzureOpenAiModelName.GPT_4O) ||
      this.modelName === "gpt-4-0125-preview"
    );
  }

  private isOneOfLatestModels(): boolean {
    return this.isOneOfLatestGpt3Models() || this.isOneOfLatestGpt4Models();
  }
}
