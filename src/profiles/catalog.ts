/**
 * catalog.ts - Reading the profile catalog from disk
 *
 * The catalog is re-read on every resolution so edits to profile.yaml take
 * effect on the next run without any cache to invalidate. Entries come back
 * sorted by directory name; that order is the first-match order.
 */

import * as fs from "fs";
import * as path from "path";
import { parse } from "yaml";
import { ConfigurationError, errorMessage } from "../errors";
import { silentLogger, type Logger } from "../utils/logger";
import type { CapabilitiesDescriptor, RequirementsDescriptor } from "../config/types";
import { selectProfile } from "./matching";
import {
  PROFILE_MANIFEST,
  ProfileManifestSchema,
  type CatalogEntry,
  type ProfileDefinition,
  type ResolvedProfile,
} from "./types";

/** Default catalog root, relative to the working directory. */
export const DEFAULT_PROFILES_DIR = "profiles";

/**
 * Parses a profile.yaml document.
 *
 * @param text - YAML source
 * @param entryName - Directory name, used when the manifest has no `name`
 * @param source - Path for error messages
 * @throws ConfigurationError on malformed YAML or schema violations
 */
export function parseProfileManifest(
  text: string,
  entryName: string,
  source: string
): ProfileDefinition {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `failed to parse profile manifest ${source}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const result = ProfileManifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid profile manifest ${source}: ${details}`);
  }

  const manifest = result.data;
  return {
    name: manifest.name ?? entryName,
    description: manifest.description,
    version: manifest.version,
    provider: manifest.provider,
    requirements: manifest.profileRequirements,
    capabilities: manifest.nodeCapabilities,
    deploymentGuide: manifest.deploymentGuide,
    templates: manifest.templates,
  };
}

/**
 * Loads every entry in the catalog, sorted by directory name.
 *
 * Plain files at the catalog root are ignored. A directory without a
 * profile.yaml, or with an invalid one, fails the whole load.
 *
 * @param profilesDir - Catalog root
 * @param logger - Diagnostic log
 * @throws ConfigurationError when the catalog or an entry can't be read
 */
export function loadCatalog(
  profilesDir: string,
  logger: Logger = silentLogger
): CatalogEntry[] {
  const root = path.resolve(profilesDir);

  let dirents: fs.Dirent[];
  try {
    dirents = fs.readdirSync(root, { withFileTypes: true });
  } catch (error) {
    throw new ConfigurationError(
      `failed to read profiles directory ${root}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const entryNames = dirents
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => dirent.name)
    .sort();

  logger.debug("Found profiles", { count: entryNames.length, directory: root });

  return entryNames.map((entryName) => {
    const directory = path.join(root, entryName);
    const manifestPath = path.join(directory, PROFILE_MANIFEST);

    let text: string;
    try {
      text = fs.readFileSync(manifestPath, "utf8");
    } catch (error) {
      throw new ConfigurationError(
        `failed to read profile manifest ${manifestPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return {
      entryName,
      directory,
      definition: parseProfileManifest(text, entryName, manifestPath),
    };
  });
}

export interface FindProfileOptions {
  /** Catalog root. Defaults to "profiles". */
  profilesDir?: string;
  logger?: Logger;
}

/**
 * Finds the profile that applies to one provider.
 *
 * Reads the catalog and runs first-match selection over the entries that
 * belong to `providerName`.
 *
 * @throws NoApplicableProfileError when no entry matches
 * @throws ConfigurationError when the catalog can't be read
 */
export function findApplicableProfile(
  requirements: RequirementsDescriptor,
  capabilities: CapabilitiesDescriptor,
  providerName: string,
  options: FindProfileOptions = {}
): ResolvedProfile {
  const logger = options.logger ?? silentLogger;
  logger.info("Finding applicable profile", {
    plugin: providerName,
    requirements,
  });

  const entries = loadCatalog(options.profilesDir ?? DEFAULT_PROFILES_DIR, logger);
  const profile = selectProfile(
    entries,
    requirements,
    capabilities,
    providerName,
    (entryName, reason) =>
      logger.debug("Profile does not match", { profile: entryName, reason })
  );

  logger.info("Found applicable profile", { plugin: providerName, profile: profile.name });
  return profile;
}
