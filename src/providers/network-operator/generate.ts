/**
 * generate.ts - Rendering a network-operator profile
 *
 * Templates see one view object:
 *
 *   profile          name, description, version
 *   requirements     fabric, deployment, multirail, spectrumX, ai, ...
 *   networkOperator  repository, componentVersion, namespace, version
 *   sriov / hostdev / rdmaShared
 *   mtu              sriov MTU for the selected fabric
 *   cluster          the discovered cluster config (workerNodes, pfs, ...)
 *
 * Sections missing from the config document are filled with their schema
 * defaults so a template never trips strict mode on a section it doesn't
 * depend on. Sections it does depend on were checked by validateLaunchConfig.
 */

import {
  ClusterConfigSchema,
  NetworkOperatorConfigSchema,
  ResourceNetworkConfigSchema,
  SriovConfigSchema,
  type ClusterConfig,
  type NetworkOperatorConfig,
  type ResourceNetworkConfig,
  type SriovConfig,
} from "../../config/types";
import { validateLaunchConfig } from "../../config/loader";
import { renderTemplates } from "../../templates/render";
import type { ResolvedProfile } from "../../profiles/types";
import type { GenerationInput } from "../types";
import { FEATURE_FLAGS } from "./requirements";

export interface TemplateView {
  profile: { name: string; description: string; version: string };
  requirements: Record<string, string | boolean>;
  networkOperator: NetworkOperatorConfig;
  sriov: SriovConfig;
  hostdev: ResourceNetworkConfig;
  rdmaShared: ResourceNetworkConfig;
  mtu: number;
  cluster: ClusterConfig;
}

export function buildTemplateView(
  profile: ResolvedProfile,
  { config, requirements }: GenerationInput
): TemplateView {
  const sriov = config.sriov ?? SriovConfigSchema.parse({});

  const flags: Record<string, boolean> = {};
  for (const flag of FEATURE_FLAGS) flags[flag] = false;

  return {
    profile: {
      name: profile.name,
      description: profile.description,
      version: profile.version,
    },
    requirements: {
      ...flags,
      ...requirements.features,
      fabric: requirements.fabric,
      deployment: requirements.deployment,
    },
    networkOperator: config.networkOperator ?? NetworkOperatorConfigSchema.parse({}),
    sriov,
    hostdev: config.hostdev ?? ResourceNetworkConfigSchema.parse({}),
    rdmaShared: config.rdmaShared ?? ResourceNetworkConfigSchema.parse({}),
    mtu: requirements.fabric === "infiniband" ? sriov.infinibandMtu : sriov.ethernetMtu,
    cluster: config.clusterConfig ?? ClusterConfigSchema.parse({}),
  };
}

/**
 * Validates the config for the deployment type, then renders the profile's
 * templates and its deployment guide.
 *
 * @returns Output file name → content; the guide is keyed by its own basename
 * @throws ConfigurationError naming a missing config value
 */
export async function generateProfileFiles(
  profile: ResolvedProfile,
  input: GenerationInput
): Promise<Record<string, string>> {
  validateLaunchConfig(input.config, input.requirements.deployment);

  const templatePaths = [...profile.templates];
  if (profile.deploymentGuide) templatePaths.push(profile.deploymentGuide);

  return renderTemplates(templatePaths, buildTemplateView(profile, input));
}
