/**
 * models.ts - Chat model construction per LLM vendor
 *
 * Each vendor is a LangChain chat model. They all expose invoke(), which is
 * the only method the rest of the code relies on (see ChatModel), so a test
 * can pass a plain object instead of a real model.
 *
 * Construction is lazy: ChatAnthropic and friends validate the API key in
 * their constructors, and the CLI should only need a key when an LLM path is
 * actually taken.
 */

import { ChatAnthropic } from "@langchain/anthropic";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { AzureChatOpenAI, ChatOpenAI } from "@langchain/openai";
import type { MessageContent } from "@langchain/core/messages";
import { ConfigurationError } from "../errors";
import { LLM_VENDORS, type LlmOptions } from "../options";

/** Messages in LangChain's [role, content] tuple form. */
export type ChatMessages = Array<[string, string]>;

/** The slice of a LangChain chat model used here. */
export interface ChatModel {
  invoke(
    messages: ChatMessages,
    options?: { signal?: AbortSignal }
  ): Promise<{ content: MessageContent }>;
}

export const DEFAULT_MODELS = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
  gemini: "gemini-1.5-pro",
} as const;

/** API version sent to Azure OpenAI deployments. */
export const AZURE_OPENAI_API_VERSION = "2024-10-21";

/**
 * Sampling temperature for profile selection. Low enough for the JSON shape
 * to stay stable, high enough for the chat to read naturally.
 */
const TEMPERATURE = 0.5;

/**
 * Builds the chat model for a vendor.
 *
 * @throws ConfigurationError for an unknown vendor, or for openai-azure
 *   without an endpoint URL and deployment (model) name
 */
export function createChatModel(llm: LlmOptions): ChatModel {
  switch (llm.vendor) {
    case "anthropic":
      return new ChatAnthropic({
        apiKey: llm.apiKey,
        model: llm.model || DEFAULT_MODELS.anthropic,
        temperature: TEMPERATURE,
        maxTokens: 2048,
        ...(llm.apiUrl ? { anthropicApiUrl: llm.apiUrl } : {}),
      });

    case "openai":
      return new ChatOpenAI({
        apiKey: llm.apiKey,
        model: llm.model || DEFAULT_MODELS.openai,
        temperature: TEMPERATURE,
        ...(llm.apiUrl ? { configuration: { baseURL: llm.apiUrl } } : {}),
      });

    case "openai-azure":
      if (!llm.apiUrl) {
        throw new ConfigurationError("--llm-api-url is required for vendor openai-azure");
      }
      if (!llm.model) {
        throw new ConfigurationError(
          "--llm-model (the Azure deployment name) is required for vendor openai-azure"
        );
      }
      return new AzureChatOpenAI({
        azureOpenAIApiKey: llm.apiKey,
        azureOpenAIEndpoint: llm.apiUrl,
        azureOpenAIApiDeploymentName: llm.model,
        azureOpenAIApiVersion: AZURE_OPENAI_API_VERSION,
        temperature: TEMPERATURE,
      });

    case "gemini":
      return new ChatGoogleGenerativeAI({
        apiKey: llm.apiKey,
        model: llm.model || DEFAULT_MODELS.gemini,
        temperature: TEMPERATURE,
      });

    default:
      throw new ConfigurationError(
        `unsupported LLM vendor: ${llm.vendor}. Supported vendors: ${LLM_VENDORS.join(", ")}`
      );
  }
}
