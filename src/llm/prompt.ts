/**
 * prompt.ts - The profile-selection system prompt
 *
 * The static instructions live in prompts/profile-selection.md so the wording
 * can be tuned without touching code. The full system prompt is:
 *
 *   <instructions>
 *   <each provider's addendum>
 *   Cluster configuration:
 *   <cluster config as JSON>
 *
 * It is built once per session; the cluster doesn't change mid-conversation.
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigurationError, errorMessage } from "../errors";
import type { ClusterConfig } from "../config/types";

/** Goes from src/llm/ up to the project root, then into prompts/. */
const promptPath = path.join(__dirname, "../../prompts/profile-selection.md");

/** Loaded lazily on first use. */
let cachedPrompt: string | null = null;

/**
 * Returns the static instructions, reading them on first call.
 *
 * @throws ConfigurationError when the prompt file is missing
 */
export function getPromptTemplate(): string {
  if (cachedPrompt === null) {
    try {
      cachedPrompt = fs.readFileSync(promptPath, "utf8");
    } catch (error) {
      throw new ConfigurationError(
        `could not load system prompt from ${promptPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
  return cachedPrompt;
}

/**
 * Assembles the system prompt for a session.
 *
 * @param clusterConfig - Discovered capabilities, serialized as JSON
 * @param addenda - Provider addenda in registry order; blank ones are skipped
 * @param template - Static instructions; defaults to the prompt file
 */
export function buildSystemPrompt(
  clusterConfig: ClusterConfig,
  addenda: string[],
  template: string = getPromptTemplate()
): string {
  const sections = [
    template.trim(),
    ...addenda.map((addendum) => addendum.trim()).filter((addendum) => addendum !== ""),
    `Cluster configuration:\n${JSON.stringify(clusterConfig, null, 2)}`,
  ];
  return sections.join("\n\n");
}

/**
 * Reads the user's requirements text for single-shot selection.
 *
 * @throws ConfigurationError when the file can't be read or is blank
 */
export function readPromptFile(promptFile: string): string {
  let text: string;
  try {
    text = fs.readFileSync(promptFile, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `failed to read prompt file ${promptFile}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  if (text.trim() === "") {
    throw new ConfigurationError(`prompt file ${promptFile} is empty`);
  }
  return text;
}
