/**
 * Model names understood by {@link OpenAiTokenizer}. On Azure the deployment
 * name is chosen by the user; these identify the underlying model.
 */
export const AzureOpenAiModelName = {
  GPT_3_5_TURBO: "gpt-3.5-turbo",
  GPT_3_5_TURBO_0301: "gpt-3.5-turbo-0301",
  GPT_3_5_TURBO_1106: "gpt-3.5-turbo-1106",
  GPT_3_5_TURBO_16K: "gpt-3.5-turbo-16k",
  GPT_4: "gpt-4",
  GPT_4_32K: "gpt-4-32k",
  GPT_4_1106_PREVIEW: "gpt-4-1106-preview",
  GPT_4_TURBO: "gpt-4-turbo",
  GPT_4O: "gpt-4o",
  GPT_4O_MINI: "gpt-4o-mini",
} as const;

export type AzureOpenAiModelName = (typeof AzureOpenAiModelName)[keyof typeof AzureOpenAiModelName];
