/**
 * merge.ts - Ownership-checked merging of provider contributions
 *
 * Providers never edit the shared descriptors directly. Each returns a patch
 * and the orchestrator folds the patches in here, one provider at a time.
 *
 * The ownership map records which provider wrote each leaf path
 * ("capabilities.nodes.sriov", "workerNodes", ...). A second provider writing
 * a path someone else already owns is a conflict and the merge fails; values
 * present in the base (defaults) have no owner and may be overwritten.
 * Arrays are leaves: they're replaced whole, never concatenated.
 */

import { ProviderError } from "../errors";
import {
  ClusterConfigSchema,
  RequirementsSchema,
  type ClusterConfig,
  type ClusterConfigPatch,
  type RequirementsDescriptor,
  type RequirementsPatch,
} from "./types";

/** Leaf path → owning provider name. */
export type OwnershipMap = Map<string, string>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merges `patch` into a copy of `base`, recording ownership.
 *
 * @param base - Current merged value (not mutated)
 * @param patch - One provider's contribution
 * @param owner - Name of the provider that produced the patch
 * @param owners - Ownership map shared across all merges of one descriptor
 * @param prefix - Dotted path of `base` within the descriptor
 * @returns A new merged object
 * @throws ProviderError when a leaf is already owned by another provider
 */
export function mergeOwned(
  base: Record<string, unknown>,
  patch: Record<string, unknown>,
  owner: string,
  owners: OwnershipMap,
  prefix = ""
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const keyPath = prefix ? `${prefix}.${key}` : key;
    const existing = merged[key];

    if (isPlainObject(value) && (existing === undefined || isPlainObject(existing))) {
      merged[key] = mergeOwned(existing ?? {}, value, owner, owners, keyPath);
      continue;
    }

    const previousOwner = owners.get(keyPath);
    if (previousOwner !== undefined && previousOwner !== owner) {
      throw new ProviderError(
        owner,
        "merge its contribution",
        new Error(`${keyPath} is already set by plugin ${previousOwner}`)
      );
    }
    owners.set(keyPath, owner);
    merged[key] = value;
  }

  return merged;
}

/**
 * Folds one provider's discovery result into the cluster config.
 *
 * The merged value is re-validated so the result is a well-formed
 * ClusterConfig even when a provider patch is sloppy.
 */
export function mergeClusterConfig(
  base: ClusterConfig,
  patch: ClusterConfigPatch,
  owner: string,
  owners: OwnershipMap
): ClusterConfig {
  const merged = mergeOwned({ ...base }, { ...patch }, owner, owners);
  return ClusterConfigSchema.parse(merged);
}

/**
 * Combines every provider's requirements patch into one descriptor.
 *
 * @param patches - Patches in provider registration order
 * @returns A frozen RequirementsDescriptor
 * @throws ProviderError when two providers set the same field or flag
 */
export function mergeRequirements(
  patches: Array<{ owner: string; patch: RequirementsPatch }>
): RequirementsDescriptor {
  const owners: OwnershipMap = new Map();
  let merged: Record<string, unknown> = {};
  for (const { owner, patch } of patches) {
    merged = mergeOwned(merged, { ...patch }, owner, owners);
  }
  return freezeRequirements(RequirementsSchema.parse(merged));
}

/**
 * Freezes a descriptor and its feature map.
 */
export function freezeRequirements(
  requirements: RequirementsDescriptor
): RequirementsDescriptor {
  Object.freeze(requirements.features);
  return Object.freeze(requirements);
}
