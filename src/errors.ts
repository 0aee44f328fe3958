/**
 * errors.ts - Error taxonomy for the launch workflow
 *
 * Every failure the workflow can surface is one of these kinds. The CLI
 * switches on the kind to tell the user what to fix: their flags, their
 * catalog, their prompt, or the cluster.
 *
 * Errors are tagged with the workflow phase they happened in (see
 * workflow/types.ts). Tagging never changes the error's class, so callers can
 * still `instanceof` the original kind after it crossed the orchestrator.
 */

import type { WorkflowPhase } from "./workflow/types";

/**
 * Base class for all workflow errors.
 *
 * `phase` starts undefined and is set once by the orchestrator via
 * tagPhase(); the first phase to tag an error wins.
 */
export abstract class LaunchKitError extends Error {
  phase?: WorkflowPhase;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid paths, flags or config values. The invocation needs fixing. */
export class ConfigurationError extends LaunchKitError {}

/** A requested provider name has no registered implementation. */
export class UnknownProviderError extends LaunchKitError {
  constructor(
    readonly providerName: string,
    readonly knownProviders: string[]
  ) {
    super(
      `unknown plugin: ${providerName} (available: ${knownProviders.join(", ") || "none"})`
    );
  }
}

/**
 * No catalog entry matched. Carries the inputs so the user can see what the
 * catalog was asked for.
 */
export class NoApplicableProfileError extends LaunchKitError {
  constructor(
    readonly providerName: string,
    readonly requirements: unknown,
    readonly capabilities: unknown
  ) {
    super(
      `no applicable profile found for plugin ${providerName} ` +
        `(requirements: ${JSON.stringify(requirements)}, capabilities: ${JSON.stringify(capabilities)})`
    );
  }
}

/** The model answered but declined to commit to a recommendation. */
export class LowConfidenceRecommendationError extends LaunchKitError {
  constructor(readonly reasoning: string) {
    super(
      "couldn't select a deployment profile based on the user prompt. " +
        "Try again with a different prompt or use the cli flags " +
        "(--fabric, --deployment-type, --multirail) to select the profile manually. " +
        `Reason: ${reasoning}`
    );
  }
}

/**
 * Why extraction failed:
 * - empty: nothing has been received from the model yet
 * - no-json: the response has no `{...}` span
 * - invalid-json: a span was found but is not a JSON object
 * - invalid-field: a field is present but holds an unusable value
 */
export type ExtractionFailure = "empty" | "no-json" | "invalid-json" | "invalid-field";

/** Model output could not be turned into requirement fields. */
export class ExtractionError extends LaunchKitError {
  constructor(
    readonly kind: ExtractionFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Wraps an untyped failure raised inside a capability provider. */
export class ProviderError extends LaunchKitError {
  constructor(
    readonly providerName: string,
    readonly operation: string,
    cause: unknown
  ) {
    super(
      `plugin ${providerName} failed to ${operation}: ${errorMessage(cause)}`,
      { cause }
    );
  }
}

/**
 * A failure of the workflow's own code rather than of a provider or the
 * user's input, such as an AbortError from a cancelled run.
 */
export class WorkflowError extends LaunchKitError {
  constructor(cause: unknown) {
    super(errorMessage(cause), { cause });
  }
}

/**
 * Extracts a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Records the phase on a workflow error and prefixes its message.
 * Errors already tagged by an inner phase keep their original tag.
 */
export function tagPhase<E extends LaunchKitError>(error: E, phase: WorkflowPhase): E {
  if (error.phase === undefined) {
    error.phase = phase;
    error.message = `${phase}: ${error.message}`;
  }
  return error;
}

/**
 * Normalizes anything thrown by a provider call.
 *
 * Typed workflow errors pass through so their kind survives; anything else
 * (kubectl failures, template errors, plain Errors) becomes a ProviderError.
 */
export function asProviderError(
  error: unknown,
  providerName: string,
  operation: string
): LaunchKitError {
  if (error instanceof LaunchKitError) return error;
  return new ProviderError(providerName, operation, error);
}
