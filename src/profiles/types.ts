/**
 * types.ts - Profile catalog entries
 *
 * A profile is a directory under the catalog root:
 *
 *   profiles/
 *     sriov-ethernet-rdma/
 *       profile.yaml        ← ProfileDefinition
 *       README.md           ← deployment guide
 *       sriov-policy.yaml   ← templates
 *
 * profile.yaml declares predicates. A predicate that is left out (or left
 * empty) is a wildcard: the profile doesn't care about that field.
 *
 *   provider: network-operator
 *   profileRequirements:        # checked against the RequirementsDescriptor
 *     fabric: ethernet
 *     deployment: sriov
 *     multirail: false          # any other key is a boolean feature flag
 *   nodeCapabilities:           # checked against clusterConfig.capabilities.nodes
 *     sriov: true
 */

import { z } from "zod";

/** File name of the manifest inside each catalog entry directory. */
export const PROFILE_MANIFEST = "profile.yaml";

/**
 * Requirement predicates, split into the two string fields and the open set
 * of boolean feature flags.
 */
export interface RequirementPredicates {
  fabric?: string;
  deployment?: string;
  features: Record<string, boolean>;
}

/**
 * profileRequirements as written in YAML: a flat map. fabric and deployment
 * must be strings; every other key must be a boolean. Empty strings and
 * nulls are wildcards and are dropped.
 */
export const RequirementPredicatesSchema = z
  .record(z.union([z.string(), z.boolean(), z.null()]))
  .default({})
  .transform((raw, ctx): RequirementPredicates => {
    const predicates: RequirementPredicates = { features: {} };

    for (const [key, value] of Object.entries(raw)) {
      if (value === null || value === "") continue;

      if (key === "fabric" || key === "deployment") {
        if (typeof value !== "string") {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} must be a string`,
          });
          continue;
        }
        predicates[key] = value;
      } else if (typeof value === "boolean") {
        predicates.features[key] = value;
      } else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} must be true or false`,
        });
      }
    }

    return predicates;
  });

/** nodeCapabilities: boolean flags; nulls are wildcards. */
export const CapabilityPredicatesSchema = z
  .record(z.union([z.boolean(), z.null()]))
  .default({})
  .transform((raw) => {
    const predicates: Record<string, boolean> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (value !== null) predicates[key] = value;
    }
    return predicates;
  });

export const ProfileManifestSchema = z.object({
  name: z.string().optional(),
  description: z.string().default(""),
  version: z.coerce.string().default("1"),
  provider: z.string().min(1),
  profileRequirements: RequirementPredicatesSchema,
  nodeCapabilities: CapabilityPredicatesSchema,
  deploymentGuide: z.string().default(""),
  templates: z.array(z.string()).default([]),
});

/**
 * A catalog entry as read from disk. Template and guide paths are still
 * relative to the entry directory.
 */
export interface ProfileDefinition {
  /** Entry name; the manifest's `name` when set, otherwise the directory name. */
  name: string;
  description: string;
  version: string;
  /** Name of the provider that owns this profile. */
  provider: string;
  requirements: RequirementPredicates;
  capabilities: Record<string, boolean>;
  deploymentGuide: string;
  templates: string[];
}

/** A catalog directory paired with its parsed definition. */
export interface CatalogEntry {
  /** Directory name; the catalog's sort key. */
  entryName: string;
  /** Absolute path of the entry directory. */
  directory: string;
  definition: ProfileDefinition;
}

/**
 * The profile chosen for a provider, with every file reference made
 * absolute so generation doesn't depend on the working directory.
 */
export interface ResolvedProfile extends ProfileDefinition {
  directory: string;
}
