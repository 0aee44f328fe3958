/**
 * profiles/index.ts - Public API for the profile catalog
 *
 * Import from here rather than from the individual modules.
 */

export type {
  CatalogEntry,
  ProfileDefinition,
  RequirementPredicates,
  ResolvedProfile,
} from "./types";
export { PROFILE_MANIFEST } from "./types";

export { findMismatch, matchesProfile, resolveEntry, selectProfile } from "./matching";
export {
  DEFAULT_PROFILES_DIR,
  findApplicableProfile,
  loadCatalog,
  parseProfileManifest,
} from "./catalog";
