/**
 * network-operator - The NVIDIA Network Operator capability provider
 *
 * Covers SR-IOV, host-device and shared-RDMA networking over Ethernet or
 * InfiniBand fabrics. Profiles for it live in the catalog with
 * `provider: network-operator`.
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigurationError, errorMessage } from "../../errors";
import type { ClusterConfigPatch, RequirementsPatch } from "../../config/types";
import type { LlmFields } from "../../llm/extract";
import type { LaunchOptions } from "../../options";
import type { ResolvedProfile } from "../../profiles/types";
import type { KubeClient } from "../../utils/kubectl";
import type {
  CapabilityProvider,
  GenerationInput,
  ProviderContext,
  ProviderIdentity,
} from "../types";
import { discoverNetworkCapabilities } from "./discovery";
import { generateProfileFiles } from "./generate";
import {
  hasRequiredFlags,
  requirementsFromFlags,
  requirementsFromLlmFields,
} from "./requirements";

export const NETWORK_OPERATOR_PROVIDER = "network-operator";

/** Goes from src/providers/network-operator/ up to the project root. */
const addendumPath = path.join(__dirname, "../../../prompts/network-operator.md");

let cachedAddendum: string | null = null;

function getAddendum(): string {
  if (cachedAddendum === null) {
    try {
      cachedAddendum = fs.readFileSync(addendumPath, "utf8");
    } catch (error) {
      throw new ConfigurationError(
        `could not load prompt addendum from ${addendumPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
  return cachedAddendum;
}

export class NetworkOperatorProvider implements CapabilityProvider {
  identity(): ProviderIdentity {
    return { name: NETWORK_OPERATOR_PROVIDER, version: "1.0.0" };
  }

  hasRequirementsFromOptions(options: LaunchOptions): boolean {
    return hasRequiredFlags(options.requirements);
  }

  buildRequirementsFromOptions(options: LaunchOptions): RequirementsPatch {
    return requirementsFromFlags(options.requirements);
  }

  buildRequirementsFromLlmResponse(fields: LlmFields): RequirementsPatch {
    return requirementsFromLlmFields(fields);
  }

  getSystemPromptAddendum(): string {
    return getAddendum();
  }

  discoverCapabilities(ctx: ProviderContext, client: KubeClient): Promise<ClusterConfigPatch> {
    return discoverNetworkCapabilities(ctx, client);
  }

  async generateFiles(
    ctx: ProviderContext,
    profile: ResolvedProfile,
    input: GenerationInput
  ): Promise<Record<string, string>> {
    ctx.signal.throwIfAborted();
    const files = await generateProfileFiles(profile, input);
    ctx.logger.info("Rendered profile", {
      profile: profile.name,
      files: Object.keys(files).join(","),
    });
    return files;
  }

  async deploy(
    ctx: ProviderContext,
    profile: ResolvedProfile,
    client: KubeClient,
    manifestsDir: string
  ): Promise<void> {
    ctx.signal.throwIfAborted();
    ctx.logger.info("Applying manifests", { profile: profile.name, directory: manifestsDir });

    const result = client.kubectl(["apply", "-f", manifestsDir]);
    if (result.isError) {
      throw new Error(`kubectl apply failed: ${result.output}`);
    }

    for (const line of result.output.split("\n")) {
      if (line.trim()) ctx.logger.info("kubectl apply", { result: line.trim() });
    }
  }
}
