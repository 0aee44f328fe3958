/**
 * select.ts - Single-shot profile selection from a prompt file
 */

import { LowConfidenceRecommendationError } from "../errors";
import { silentLogger, type Logger } from "../utils/logger";
import type { LlmCompletion } from "./completion";
import { extractFields, isLowConfidence, type LlmFields } from "./extract";

export interface SelectOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Asks the model once for requirement fields.
 *
 * Uses the same extractor as the interactive session, so the two paths
 * accept exactly the same response shapes.
 *
 * @param promptText - The user's requirements in free text
 * @param systemPrompt - Built with buildSystemPrompt()
 * @throws LowConfidenceRecommendationError when the model marks its answer
 *   as low confidence
 * @throws ExtractionError when the reply has no usable JSON
 */
export async function selectProfileFromPrompt(
  promptText: string,
  systemPrompt: string,
  completion: LlmCompletion,
  options: SelectOptions = {}
): Promise<LlmFields> {
  const logger = options.logger ?? silentLogger;

  const reply = await completion.complete(systemPrompt, [], promptText, options.signal);
  logger.debug("LLM response", { response: reply });

  const fields = extractFields(reply);
  if (isLowConfidence(fields)) {
    throw new LowConfidenceRecommendationError(fields.reasoning ?? "");
  }

  logger.info("LLM selected requirements", { fields });
  return fields;
}
