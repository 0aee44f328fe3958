/**
 * types.ts - Workflow phases, dependencies and the run summary
 */

import type { RequirementsDescriptor } from "../config/types";
import type { LlmCompletion } from "../llm/completion";
import type { LlmOptions } from "../options";
import type { ProviderFactory } from "../providers/registry";
import type { ResolvedProfile } from "../profiles/types";
import type { Output } from "../ui";
import type { KubeClient } from "../utils/kubectl";
import type { Logger } from "../utils/logger";

/**
 * Phases in execution order. discovery and deployment are skipped when not
 * requested; the run can also stop after requirements (see WorkflowResult).
 */
export type WorkflowPhase =
  | "init"
  | "discovery"
  | "requirements"
  | "resolution"
  | "generation"
  | "deployment";

/** Where the run's requirements came from. */
export type RequirementsSource = "config" | "flags" | "prompt" | "interactive";

/**
 * Collaborators of a run. Everything is optional; the CLI passes the real
 * terminal UI and logger, tests pass fakes.
 */
export interface WorkflowDependencies {
  /** Provider factories by name. Defaults to the built-in providers. */
  providers?: Record<string, ProviderFactory>;
  /** Builds the cluster client. Defaults to a kubectl-backed client. */
  createKubeClient?: (kubeconfig?: string) => KubeClient;
  /** Builds the LLM backend. Defaults to a LangChain chat model for the vendor. */
  createCompletion?: (llm: LlmOptions) => LlmCompletion;
  /** Overrides the static system prompt instructions. */
  systemPromptTemplate?: string;
  logger?: Logger;
  ui?: Output;
  signal?: AbortSignal;
}

/** Summary of a finished run. */
export type WorkflowResult =
  | {
      /** Nothing to do: no flags, prompt or interactive session given. */
      status: "skipped";
      phases: WorkflowPhase[];
      configPath: string;
    }
  | {
      status: "done";
      /** Phases that completed, in order. */
      phases: WorkflowPhase[];
      configPath: string;
      requirements: RequirementsDescriptor;
      requirementsSource: RequirementsSource;
      /** Resolved profile per provider name, in registry order. */
      profiles: Record<string, ResolvedProfile>;
      /** Generated file names per provider name. */
      generated: Record<string, string[]>;
    };
