/**
 * completion.ts - The LLM completion seam
 *
 * The session and single-shot selection talk to an LlmCompletion, never to a
 * vendor SDK. One completion is one request: the fixed system prompt, the
 * conversation so far, and the new user text. The reply is plain text.
 */

import type { MessageContent } from "@langchain/core/messages";
import { createChatModel, type ChatMessages, type ChatModel } from "./models";
import type { LlmOptions } from "../options";

/** One turn of a conversation. */
export interface ChatTurn {
  role: "human" | "assistant";
  content: string;
}

export interface LlmCompletion {
  /**
   * @param systemPrompt - Sent first on every request
   * @param history - Earlier turns, oldest first (not including userText)
   * @param userText - The new human message
   * @param signal - Cancels the in-flight request
   * @returns The assistant's reply text
   */
  complete(
    systemPrompt: string,
    history: readonly ChatTurn[],
    userText: string,
    signal?: AbortSignal
  ): Promise<string>;
}

/**
 * Flattens LangChain message content to text.
 *
 * Content is either a string or an array of blocks (text, images, tool use);
 * only text blocks are kept.
 */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") return content;

  return content
    .map((block) => {
      if (block.type === "text" && "text" in block && typeof block.text === "string") {
        return block.text;
      }
      return "";
    })
    .join("");
}

/**
 * Builds the LangChain message list for one request.
 */
export function buildMessages(
  systemPrompt: string,
  history: readonly ChatTurn[],
  userText: string
): ChatMessages {
  return [
    ["system", systemPrompt],
    ...history.map((turn): [string, string] => [
      turn.role === "human" ? "human" : "ai",
      turn.content,
    ]),
    ["human", userText],
  ];
}

/**
 * Wraps a chat model as an LlmCompletion.
 */
export function createModelCompletion(model: ChatModel): LlmCompletion {
  return {
    async complete(systemPrompt, history, userText, signal) {
      const response = await model.invoke(
        buildMessages(systemPrompt, history, userText),
        signal ? { signal } : undefined
      );
      return messageText(response.content);
    },
  };
}

/**
 * The default backend: a LangChain chat model for the configured vendor,
 * created on first use.
 */
export function createLlmCompletion(llm: LlmOptions): LlmCompletion {
  let model: ChatModel | null = null;
  return {
    complete(systemPrompt, history, userText, signal) {
      if (!model) model = createChatModel(llm);
      return createModelCompletion(model).complete(systemPrompt, history, userText, signal);
    },
  };
}
