/**
 * extract.ts - Pulling requirement fields out of model output
 *
 * Models are asked to answer with a JSON object, but what comes back is
 * prose: sometimes bare JSON, sometimes JSON in a ```json fence, sometimes
 * JSON between two paragraphs of explanation. extractFields() handles all
 * three in four steps:
 *
 *   1. strip a surrounding markdown fence
 *   2. take the text from the first "{" to the last "}"
 *   3. JSON.parse it
 *   4. turn every value into a string
 *
 * Step 4 exists because requirement fields are read as strings downstream;
 * `"multirail": true` and `"multirail": "true"` must mean the same thing.
 */

import { ExtractionError, errorMessage } from "../errors";

/** Flat requirement fields as produced by the model. */
export type LlmFields = Record<string, string>;

/**
 * Removes markdown code-fence wrapping from a model response.
 *
 * A leading ```json (or bare ```) and a trailing ``` are stripped
 * independently, then whitespace is trimmed. Text without fences comes back
 * trimmed and otherwise unchanged, so the function is idempotent.
 */
export function trimMarkdownJson(text: string): string {
  let trimmed = text.trim();

  if (trimmed.startsWith("```json")) {
    trimmed = trimmed.slice("```json".length);
  } else if (trimmed.startsWith("```")) {
    trimmed = trimmed.slice("```".length);
  }

  if (trimmed.endsWith("```")) {
    trimmed = trimmed.slice(0, -"```".length);
  }

  return trimmed.trim();
}

/**
 * Renders one JSON value as a field string.
 * null becomes the empty string; arrays and objects stay JSON.
 */
function toFieldString(value: unknown): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Extracts the JSON object embedded in a model response as a flat string map.
 *
 * @param response - Raw model output
 * @throws ExtractionError "empty" when the response is blank
 * @throws ExtractionError "no-json" when there is no "{...}" span
 * @throws ExtractionError "invalid-json" when the span isn't a JSON object
 */
export function extractFields(response: string): LlmFields {
  if (response.trim() === "") {
    throw new ExtractionError("empty", "no response to extract profile from");
  }

  const stripped = trimMarkdownJson(response);
  const start = stripped.indexOf("{");
  const end = stripped.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    throw new ExtractionError("no-json", "no valid JSON found in response");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripped.slice(start, end + 1));
  } catch (error) {
    throw new ExtractionError(
      "invalid-json",
      `failed to parse profile JSON: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ExtractionError("invalid-json", "profile JSON must be an object");
  }

  const fields: LlmFields = {};
  for (const [key, value] of Object.entries(parsed)) {
    fields[key] = toFieldString(value);
  }
  return fields;
}

/**
 * True when the model flagged its own answer as low confidence.
 */
export function isLowConfidence(fields: LlmFields): boolean {
  return fields.confidence === "low";
}
