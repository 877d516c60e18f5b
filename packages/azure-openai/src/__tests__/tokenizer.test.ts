import {
  aiMessage,
  systemMessage,
  toolExecutionResultMessage,
  toolParameters,
  type ToolSpecification,
  userMessage,
} from "@tessera/core";
import { describe, expect, it } from "vitest";
import { AzureOpenAiModelName } from "../model-name.js";
import { OpenAiTokenizer } from "../tokenizer.js";
import { wordEncoder } from "./helpers.js";

const weatherTool: ToolSpecification = {
  name: "get_weather",
  description: "Current weather for a city",
  parameters: toolParameters({ city: { type: "string", description: "City name" } }, ["city"]),
};

describe("OpenAiTokenizer", () => {
  describe("with the cl100k_base encoding", () => {
    const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_3_5_TURBO);

    it("should count text tokens", () => {
      expect(tokenizer.estimateTokenCountInText("Hello world")).toBe(2);
    });

    it("should add message overhead and role", () => {
      expect(tokenizer.estimateTokenCountInMessage(userMessage("Hello world"))).toBe(6);
    });

    it("should add the reply primer to message lists", () => {
      expect(tokenizer.estimateTokenCountInMessages([userMessage("Hello world")])).toBe(9);
      expect(tokenizer.estimateTokenCountInMessages([])).toBe(3);
    });
  });

  describe("messages", () => {
    const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4, { encoder: wordEncoder });

    it("should count system messages", () => {
      expect(tokenizer.estimateTokenCountInMessage(systemMessage("You are helpful"))).toBe(7);
    });

    it("should count participant names", () => {
      // 3 + role + text + 1 + name
      expect(tokenizer.estimateTokenCountInMessage(userMessage("Hi there", "bob"))).toBe(8);
    });

    it("should discount names on gpt-3.5-turbo-0301", () => {
      const legacy = new OpenAiTokenizer(AzureOpenAiModelName.GPT_3_5_TURBO_0301, { encoder: wordEncoder });
      expect(legacy.estimateTokenCountInMessage(userMessage("Hi there", "bob"))).toBe(7);
    });

    it("should count a single tool execution request", () => {
      const message = aiMessage([{ id: "call_1", name: "get_weather", arguments: '{"city": "Paris"}' }]);
      // 3 + role + 3 - 1 + name * 2 + arguments
      expect(tokenizer.estimateTokenCountInMessage(message)).toBe(10);
    });

    it("should count each argument of parallel tool execution requests", () => {
      const message = aiMessage([
        { id: "call_1", name: "get_weather", arguments: '{"city": "Paris"}' },
        { id: "call_2", name: "get_time", arguments: "{}" },
      ]);
      // 3 + role + 3 + 15 + (7 + 1 + 2 + 1 + 1) + (7 + 1)
      expect(tokenizer.estimateTokenCountInMessage(message)).toBe(42);
    });

    it("should count tool results as text", () => {
      const message = toolExecutionResultMessage({ id: "call_1", name: "get_weather", arguments: "{}" }, "sunny and warm");
      expect(tokenizer.estimateTokenCountInMessage(message)).toBe(7);
    });
  });

  describe("tool specifications", () => {
    it("should count name, description and parameters", () => {
      const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4, { encoder: wordEncoder });
      // 16 + 6 + name + 2 + description + (3 + 3 + name + 2 + description)
      expect(tokenizer.estimateTokenCountInToolSpecification(weatherTool)).toBe(41);
    });

    it("should count enum values", () => {
      const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4, { encoder: wordEncoder });
      const convert: ToolSpecification = {
        name: "convert",
        parameters: toolParameters({ unit: { type: "string", enum: ["celsius", "fahrenheit"] } }),
      };
      // 16 + 6 + 1 + (3 + 3 + 1 - 3 + 4 + 4)
      expect(tokenizer.estimateTokenCountInToolSpecifications([convert])).toBe(35);
    });

    it("should add the forcing overhead", () => {
      const gpt4 = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4, { encoder: wordEncoder });
      const gpt4o = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4O, { encoder: wordEncoder });

      expect(gpt4.estimateTokenCountInForcefulToolSpecification(weatherTool)).toBe(46);
      expect(gpt4o.estimateTokenCountInForcefulToolSpecification(weatherTool)).toBe(49);
    });
  });

  describe("tool execution requests", () => {
    const request = { id: "call_1", name: "get_weather", arguments: '{"city": "Paris"}' };

    it("should count name and arguments per request", () => {
      const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4, { encoder: wordEncoder });
      expect(tokenizer.estimateTokenCountInToolExecutionRequests([request])).toBe(7);
    });

    it("should apply the newer models' overhead", () => {
      const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4O, { encoder: wordEncoder });
      // 7 + 16 + 1 - 1 - 2 + 2 + 1
      expect(tokenizer.estimateTokenCountInToolExecutionRequests([request])).toBe(24);
    });

    it("should count only the arguments of a forced request", () => {
      const gpt4 = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4, { encoder: wordEncoder });
      const gpt4o = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4O, { encoder: wordEncoder });

      expect(gpt4.estimateTokenCountInForcefulToolExecutionRequest(request)).toBe(2);
      expect(gpt4o.estimateTokenCountInForcefulToolExecutionRequest(request)).toBe(2);
      expect(gpt4o.estimateTokenCountInForcefulToolExecutionRequest({ name: "ping", arguments: "{}" })).toBe(1);
    });

    it("should treat malformed arguments as none", () => {
      const tokenizer = new OpenAiTokenizer(AzureOpenAiModelName.GPT_4O, { encoder: wordEncoder });
      expect(tokenizer.estimateTokenCountInForcefulToolExecutionRequest({ name: "ping", arguments: "{not json" })).toBe(1);
    });
  });
});
