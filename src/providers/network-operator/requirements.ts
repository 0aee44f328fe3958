/**
 * requirements.ts - Network-operator requirement vocabulary
 *
 * This provider owns fabric, deployment and three feature flags. They arrive
 * either as CLI flags or as strings from the LLM; both paths normalize to the
 * same patch, and both reject values outside the vocabulary.
 */

import { ConfigurationError, ExtractionError } from "../../errors";
import type { RequirementsPatch } from "../../config/types";
import type { LlmFields } from "../../llm/extract";
import type { RequirementFlags } from "../../options";

export const FABRICS = ["ethernet", "infiniband"] as const;
export const DEPLOYMENT_TYPES = ["sriov", "hostdev", "rdma_shared"] as const;
export const FEATURE_FLAGS = ["multirail", "spectrumX", "ai"] as const;

export type Fabric = (typeof FABRICS)[number];
export type DeploymentType = (typeof DEPLOYMENT_TYPES)[number];
export type FeatureFlag = (typeof FEATURE_FLAGS)[number];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

function normalize(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase();
}

/** True when the flags name both a fabric and a deployment type. */
export function hasRequiredFlags(flags: RequirementFlags): boolean {
  return normalize(flags.fabric) !== "" && normalize(flags.deploymentType) !== "";
}

/**
 * Builds the patch from CLI flags. Feature flags that weren't given are
 * recorded as false.
 *
 * @throws ConfigurationError for an unsupported fabric or deployment type
 */
export function requirementsFromFlags(flags: RequirementFlags): RequirementsPatch {
  const fabric = normalize(flags.fabric);
  const deployment = normalize(flags.deploymentType);

  if (!isOneOf(FABRICS, fabric)) {
    throw new ConfigurationError(
      `unsupported fabric "${flags.fabric ?? ""}" (expected one of: ${FABRICS.join(", ")})`
    );
  }
  if (!isOneOf(DEPLOYMENT_TYPES, deployment)) {
    throw new ConfigurationError(
      `unsupported deployment type "${flags.deploymentType ?? ""}" ` +
        `(expected one of: ${DEPLOYMENT_TYPES.join(", ")})`
    );
  }

  return {
    fabric,
    deployment,
    features: {
      multirail: flags.multirail ?? false,
      spectrumX: flags.spectrumX ?? false,
      ai: flags.ai ?? false,
    },
  };
}

/**
 * Reads a boolean field from LLM output. A missing field is false.
 */
function parseBooleanField(fields: LlmFields, key: FeatureFlag): boolean {
  const raw = fields[key];
  if (raw === undefined || raw.trim() === "") return false;

  switch (raw.trim().toLowerCase()) {
    case "true":
    case "yes":
      return true;
    case "false":
    case "no":
      return false;
    default:
      throw new ExtractionError("invalid-field", `${key} must be true or false, got "${raw}"`);
  }
}

/**
 * Builds the patch from the LLM's flat field map.
 *
 * The deployment type is read from "deploymentType", falling back to
 * "deployment".
 *
 * @throws ExtractionError "invalid-field" for missing or unsupported values
 */
export function requirementsFromLlmFields(fields: LlmFields): RequirementsPatch {
  const fabric = normalize(fields.fabric);
  const deployment = normalize(fields.deploymentType ?? fields.deployment);

  if (!isOneOf(FABRICS, fabric)) {
    throw new ExtractionError(
      "invalid-field",
      `fabric must be one of ${FABRICS.join(", ")}, got "${fields.fabric ?? ""}"`
    );
  }
  if (!isOneOf(DEPLOYMENT_TYPES, deployment)) {
    throw new ExtractionError(
      "invalid-field",
      `deploymentType must be one of ${DEPLOYMENT_TYPES.join(", ")}, ` +
        `got "${fields.deploymentType ?? fields.deployment ?? ""}"`
    );
  }

  const features: Record<string, boolean> = {};
  for (const flag of FEATURE_FLAGS) {
    features[flag] = parseBooleanField(fields, flag);
  }

  return { fabric, deployment, features };
}
