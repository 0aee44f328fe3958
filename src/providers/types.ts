/**
 * types.ts - The capability provider interface
 *
 * A capability provider is the integration point for one networking
 * technology. The workflow knows nothing about SR-IOV, RDMA or operators; it
 * asks each enabled provider, in registration order, to:
 *
 *   1. say whether CLI flags fully describe its requirements
 *   2. turn flags or LLM output into a requirements patch
 *   3. discover what the cluster can do (a cluster config patch)
 *   4. render files for the profile resolved on its behalf
 *   5. apply those files
 *
 * Providers return patches and file maps; they never edit shared state or
 * write into the output directory themselves. The workflow merges, persists
 * and detects conflicts between providers.
 */

import type {
  ClusterConfigPatch,
  LaunchConfig,
  RequirementsDescriptor,
  RequirementsPatch,
} from "../config/types";
import type { LlmFields } from "../llm/extract";
import type { LaunchOptions } from "../options";
import type { ResolvedProfile } from "../profiles/types";
import type { Output } from "../ui";
import type { KubeClient } from "../utils/kubectl";
import type { Logger } from "../utils/logger";

export interface ProviderIdentity {
  /** Registry key, catalog filter and output sub-directory name. */
  name: string;
  version: string;
}

/** Passed to every provider call. */
export interface ProviderContext {
  /** Aborted when the run is cancelled; providers check it between steps. */
  signal: AbortSignal;
  logger: Logger;
  ui: Output;
}

/**
 * What generateFiles() renders from: the loaded config document plus the
 * run's requirements (which may not be in the document).
 */
export interface GenerationInput {
  config: LaunchConfig;
  requirements: RequirementsDescriptor;
}

export interface CapabilityProvider {
  identity(): ProviderIdentity;

  hasRequirementsFromOptions(options: LaunchOptions): boolean;

  /**
   * @throws ConfigurationError when a flag holds a value the provider
   *   doesn't support
   */
  buildRequirementsFromOptions(options: LaunchOptions): RequirementsPatch;

  /**
   * @throws ExtractionError "invalid-field" when a field holds a value the
   *   provider doesn't support
   */
  buildRequirementsFromLlmResponse(fields: LlmFields): RequirementsPatch;

  /** Provider-specific instructions for the LLM system prompt; may be "". */
  getSystemPromptAddendum(): string;

  /** Idempotent. Returns only what this provider discovered. */
  discoverCapabilities(ctx: ProviderContext, client: KubeClient): Promise<ClusterConfigPatch>;

  /** @returns Output file name → content */
  generateFiles(
    ctx: ProviderContext,
    profile: ResolvedProfile,
    input: GenerationInput
  ): Promise<Record<string, string>>;

  /** Applies the files previously written to manifestsDir. */
  deploy(
    ctx: ProviderContext,
    profile: ResolvedProfile,
    client: KubeClient,
    manifestsDir: string
  ): Promise<void>;
}
