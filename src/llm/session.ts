/**
 * session.ts - A multi-turn profile-selection conversation
 *
 * The session owns the conversation: a system prompt fixed at creation,
 * the history of turns (append-only), and the most recent reply. Only that
 * last reply is ever parsed for requirements; earlier answers are history.
 *
 * A turn is recorded only after the model answers. A failed request leaves
 * the history as it was, so the next request still alternates human and
 * assistant turns.
 */

import { extractFields, type LlmFields } from "./extract";
import type { ChatTurn, LlmCompletion } from "./completion";

export class ChatSession {
  private readonly history: ChatTurn[] = [];
  private lastResponse = "";

  constructor(
    private readonly completion: LlmCompletion,
    readonly systemPrompt: string
  ) {}

  /**
   * Sends one message with the full history and records both turns.
   *
   * @returns The assistant's reply
   * @throws Error when the request fails or the reply is empty
   */
  async sendMessage(text: string, signal?: AbortSignal): Promise<string> {
    const reply = await this.completion.complete(this.systemPrompt, this.history, text, signal);
    if (reply.trim() === "") {
      throw new Error("no response from LLM");
    }

    this.history.push({ role: "human", content: text });
    this.history.push({ role: "assistant", content: reply });
    this.lastResponse = reply;
    return reply;
  }

  /** A copy of the conversation so far, oldest first. */
  getHistory(): ChatTurn[] {
    return [...this.history];
  }

  getLastResponse(): string {
    return this.lastResponse;
  }

  /**
   * Parses the requirement fields out of the last reply.
   *
   * @throws ExtractionError "empty" before the first successful reply
   */
  extractProfile(): LlmFields {
    return extractFields(this.lastResponse);
  }
}

/** Shown after every assistant reply in interactive mode. */
export const INTERACTIVE_PROMPT_SUFFIX =
  "If you would like to generate the deployment files for the recommended profile, " +
  "type 'generate'. If you have another question, type it here.";
