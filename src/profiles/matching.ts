/**
 * matching.ts - Profile predicate evaluation and first-match selection
 *
 * Pure functions only: no disk, no logging side effects beyond the optional
 * trace callback. catalog.ts does the reading and calls in here.
 *
 * Matching rules:
 * - A predicate that isn't declared always holds.
 * - fabric / deployment predicates are exact string matches.
 * - Boolean predicates compare against the descriptor's flag, where a flag
 *   the descriptor doesn't set reads as false.
 * - Entries are tried in catalog order and the first full match wins. There
 *   is no scoring: catalog authors order entries from specific to general.
 */

import * as path from "path";
import { NoApplicableProfileError } from "../errors";
import type { CapabilitiesDescriptor, RequirementsDescriptor } from "../config/types";
import type { CatalogEntry, ProfileDefinition, ResolvedProfile } from "./types";

/**
 * Finds the first predicate of a profile that the inputs violate.
 *
 * @returns A short description like "fabric: want ethernet, have infiniband",
 *   or null when every declared predicate holds
 */
export function findMismatch(
  profile: ProfileDefinition,
  requirements: RequirementsDescriptor,
  capabilities: CapabilitiesDescriptor
): string | null {
  const { fabric, deployment, features } = profile.requirements;

  if (fabric !== undefined && fabric !== requirements.fabric) {
    return `fabric: want ${fabric}, have ${requirements.fabric || "(unset)"}`;
  }
  if (deployment !== undefined && deployment !== requirements.deployment) {
    return `deployment: want ${deployment}, have ${requirements.deployment || "(unset)"}`;
  }

  for (const [flag, wanted] of Object.entries(features)) {
    const actual = requirements.features[flag] ?? false;
    if (actual !== wanted) return `${flag}: want ${wanted}, have ${actual}`;
  }

  for (const [capability, wanted] of Object.entries(profile.capabilities)) {
    const actual = capabilities.nodes[capability] ?? false;
    if (actual !== wanted) return `${capability} capability: want ${wanted}, have ${actual}`;
  }

  return null;
}

/**
 * Returns true when every declared predicate of the profile holds.
 */
export function matchesProfile(
  profile: ProfileDefinition,
  requirements: RequirementsDescriptor,
  capabilities: CapabilitiesDescriptor
): boolean {
  return findMismatch(profile, requirements, capabilities) === null;
}

/**
 * Binds a catalog entry to its directory, making every file reference absolute.
 */
export function resolveEntry(entry: CatalogEntry): ResolvedProfile {
  const { definition, directory } = entry;
  return {
    ...definition,
    requirements: {
      ...definition.requirements,
      features: { ...definition.requirements.features },
    },
    capabilities: { ...definition.capabilities },
    templates: definition.templates.map((template) => path.resolve(directory, template)),
    deploymentGuide: definition.deploymentGuide
      ? path.resolve(directory, definition.deploymentGuide)
      : "",
    directory,
  };
}

/**
 * Selects the first catalog entry owned by `providerName` whose predicates
 * all hold.
 *
 * @param entries - Catalog entries, already in catalog order
 * @param onSkip - Called with the entry name and reason for each non-match
 * @throws NoApplicableProfileError when nothing matches
 */
export function selectProfile(
  entries: CatalogEntry[],
  requirements: RequirementsDescriptor,
  capabilities: CapabilitiesDescriptor,
  providerName: string,
  onSkip?: (entryName: string, reason: string) => void
): ResolvedProfile {
  for (const entry of entries) {
    if (entry.definition.provider !== providerName) continue;

    const mismatch = findMismatch(entry.definition, requirements, capabilities);
    if (mismatch === null) return resolveEntry(entry);
    onSkip?.(entry.entryName, mismatch);
  }

  throw new NoApplicableProfileError(providerName, requirements, capabilities);
}
