/**
 * interactive.ts - The chat loop behind --llm-interactive
 *
 * The user talks to the model until they type "generate", which extracts
 * requirement fields from the model's last reply. "exit" or "quit" (or
 * Ctrl+C) abandons the run.
 *
 * Nothing the user or the model does inside the loop ends it except those
 * commands: a failed request or an unusable reply is reported and the user
 * gets another turn.
 */

import { ConfigurationError, ExtractionError, errorMessage } from "../errors";
import { isLowConfidence, type LlmFields } from "../llm/extract";
import { INTERACTIVE_PROMPT_SUFFIX, type ChatSession } from "../llm/session";
import type { Output } from "../ui";
import { silentLogger, type Logger } from "../utils/logger";

export interface InteractiveOptions {
  ui: Output;
  signal: AbortSignal;
  logger?: Logger;
  /**
   * Turns extracted fields into requirements. Called on "generate"; an
   * ExtractionError sends the user back to the chat.
   */
  accept?: (fields: LlmFields) => void;
}

const CANCEL_COMMANDS = new Set(["exit", "quit"]);

/**
 * Runs the chat until the user generates or cancels.
 *
 * @returns The accepted requirement fields
 * @throws ConfigurationError("session cancelled by user") on exit/quit/Ctrl+C
 */
export async function runInteractiveSession(
  session: ChatSession,
  options: InteractiveOptions
): Promise<LlmFields> {
  const { ui, signal } = options;
  const logger = options.logger ?? silentLogger;

  ui.section("Interactive profile selection");
  ui.info(
    "Describe your cluster and what you want to run on it. " +
      "Type 'generate' to use the last recommendation, or 'exit' to quit."
  );

  for (;;) {
    signal.throwIfAborted();
    const input = await ui.ask("You");

    if (input === null || CANCEL_COMMANDS.has(input.toLowerCase())) {
      throw new ConfigurationError("session cancelled by user");
    }
    if (input === "") continue;

    if (input.toLowerCase() === "generate") {
      let fields: LlmFields;
      try {
        fields = session.extractProfile();
        options.accept?.(fields);
      } catch (error) {
        if (!(error instanceof ExtractionError)) throw error;
        ui.error(`Could not use the last recommendation: ${error.message}`);
        ui.info("Ask a question first, or refine your requirements.");
        continue;
      }

      if (isLowConfidence(fields)) {
        ui.warning(
          `The recommendation has low confidence. Reason: ${fields.reasoning ?? "none given"}`
        );
        const proceed = await ui.confirm("Generate anyway?");
        if (!proceed) {
          ui.info("Ask another question or refine your requirements.");
          continue;
        }
      }

      logger.info("Interactive session accepted recommendation", { fields });
      return fields;
    }

    const progress = ui.startProgress("Waiting for the model");
    try {
      const reply = await session.sendMessage(input, signal);
      progress.succeed("Response received");
      ui.print(`${reply}\n\n${INTERACTIVE_PROMPT_SUFFIX}`);
    } catch (error) {
      progress.fail("Request failed");
      if (signal.aborted) throw error;
      logger.warn("LLM request failed", { error: errorMessage(error) });
      ui.error(errorMessage(error));
    }
  }
}
