/**
 * Chat completions transport for Azure OpenAI and OpenAI.
 *
 * @module @tessera/azure-openai/client
 */

import { getBearerTokenProvider, type TokenCredential } from "@azure/identity";
import { ErrorCode } from "@tessera/shared";
import { providerError } from "@tessera/core";
import OpenAI, { AzureOpenAI } from "openai";
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
} from "openai/resources/chat/completions";

// =============================================================================
// Constants
// =============================================================================

export const OPENAI_BASE_URL = "https://api.openai.com/v1";

export const DEFAULT_SERVICE_VERSION = "2024-10-21";

/**
 * Entra ID scope for Azure AI services
 */
export const COGNITIVE_SERVICES_SCOPE = "https://cognitiveservices.azure.com/.default";

// =============================================================================
// Types
// =============================================================================

/**
 * The one call the streaming chat model makes. Implemented over the OpenAI
 * SDK by {@link createChatCompletionsClient}; tests provide their own.
 */
export interface ChatCompletionsClient {
  streamChatCompletions(
    request: ChatCompletionCreateParamsStreaming
  ): Promise<AsyncIterable<ChatCompletionChunk>>;
}

export interface ChatCompletionsClientOptions {
  endpoint?: string;
  serviceVersion?: string;
  apiKey?: string;
  /** Key for api.openai.com; the endpoint is then ignored */
  nonAzureApiKey?: string;
  tokenCredential?: TokenCredential;
  deploymentName?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  maxRetries?: number;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Adapt an SDK client (`OpenAI` or `AzureOpenAI`).
 */
export function wrapOpenAiClient(client: OpenAI): ChatCompletionsClient {
  return {
    async streamChatCompletions(request) {
      return client.chat.completions.create(request);
    },
  };
}

/**
 * Build a client from connection options. Credentials are tried in order:
 * token credential, non-Azure key, Azure key.
 *
 * @throws ProviderError with `PROVIDER_INITIALIZATION_FAILED` when the endpoint
 * or every credential is missing
 */
export function createChatCompletionsClient(options: ChatCompletionsClientOptions): ChatCompletionsClient {
  const transport = { timeout: options.timeout, maxRetries: options.maxRetries };

  if (options.tokenCredential) {
    return wrapOpenAiClient(
      new AzureOpenAI({
        endpoint: requireEndpoint(options.endpoint),
        apiVersion: options.serviceVersion ?? DEFAULT_SERVICE_VERSION,
        deployment: options.deploymentName,
        azureADTokenProvider: getBearerTokenProvider(options.tokenCredential, COGNITIVE_SERVICES_SCOPE),
        ...transport,
      })
    );
  }

  if (options.nonAzureApiKey) {
    return wrapOpenAiClient(
      new OpenAI({ apiKey: options.nonAzureApiKey, baseURL: OPENAI_BASE_URL, ...transport })
    );
  }

  if (options.apiKey) {
    return wrapOpenAiClient(
      new AzureOpenAI({
        endpoint: requireEndpoint(options.endpoint),
        apiVersion: options.serviceVersion ?? DEFAULT_SERVICE_VERSION,
        deployment: options.deploymentName,
        apiKey: options.apiKey,
        ...transport,
      })
    );
  }

  throw providerError(
    "Azure OpenAI needs an API key, a non-Azure API key or a token credential",
    ErrorCode.PROVIDER_INITIALIZATION_FAILED,
    { provider: "azure-openai" }
  );
}

function requireEndpoint(endpoint: string | undefined): string {
  if (!endpoint) {
    throw providerError("Azure OpenAI endpoint is required", ErrorCode.PROVIDER_INITIALIZATION_FAILED, {
      provider: "azure-openai",
    });
  }
  return endpoint;
}
