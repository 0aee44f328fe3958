/**
 * loader.ts - Reading, writing and validating the launch config document
 *
 * The document is YAML on disk and a Zod-validated LaunchConfig in memory.
 * All failures here are ConfigurationErrors: the user pointed us at a bad
 * path or wrote a bad file, and the message says which.
 */

import * as fs from "fs";
import * as path from "path";
import { parse, stringify } from "yaml";
import { ZodError } from "zod";
import { ConfigurationError, errorMessage } from "../errors";
import { silentLogger, type Logger } from "../utils/logger";
import { LaunchConfigSchema, type LaunchConfig } from "./types";

/**
 * Turns a ZodError into "field.path: problem" lines.
 */
function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parses and validates a config document from YAML text.
 *
 * @param text - YAML source
 * @param source - Where the text came from, for error messages
 * @throws ConfigurationError on malformed YAML or schema violations
 */
export function parseLaunchConfig(text: string, source: string): LaunchConfig {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `failed to parse cluster config YAML ${source}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  // An empty file parses to null; treat it as an empty document.
  const result = LaunchConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `invalid cluster config ${source}: ${describeZodError(result.error)}`
    );
  }
  return result.data;
}

/**
 * Loads the config document from disk.
 *
 * @param configPath - Path to the YAML document
 * @param logger - Diagnostic log
 * @throws ConfigurationError for an empty path, a missing file, or bad content
 */
export function loadLaunchConfig(
  configPath: string,
  logger: Logger = silentLogger
): LaunchConfig {
  if (!configPath) {
    throw new ConfigurationError("no cluster configuration path provided");
  }
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(
      `cluster configuration file ${configPath} does not exist`
    );
  }

  logger.debug("Loading cluster config", { path: configPath });
  const text = fs.readFileSync(configPath, "utf8");
  return parseLaunchConfig(text, configPath);
}

/**
 * Writes the config document, creating parent directories as needed.
 *
 * @throws ConfigurationError when the path can't be written
 */
export function saveLaunchConfig(
  configPath: string,
  config: LaunchConfig,
  logger: Logger = silentLogger
): void {
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, stringify(config), "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `failed to write cluster config to ${configPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  logger.info("Saved cluster config", { path: configPath });
}

/**
 * Which config section each deployment type renders from.
 */
const DEPLOYMENT_SECTIONS: Record<string, "sriov" | "hostdev" | "rdmaShared"> = {
  sriov: "sriov",
  hostdev: "hostdev",
  rdma_shared: "rdmaShared",
};

/**
 * Checks that the config has the settings a deployment needs before any
 * template is rendered, so a missing value is reported by name rather than
 * as a template error.
 *
 * @param config - Loaded config document
 * @param deployment - The requirements' deployment type (e.g. "sriov")
 * @throws ConfigurationError naming the first missing field
 */
export function validateLaunchConfig(config: LaunchConfig, deployment: string): void {
  const operator = config.networkOperator;
  if (!operator) {
    throw new ConfigurationError("networkOperator section is required");
  }
  for (const field of ["repository", "componentVersion", "namespace"] as const) {
    if (!operator[field]) {
      throw new ConfigurationError(`networkOperator.${field} is required`);
    }
  }

  const sectionName = DEPLOYMENT_SECTIONS[deployment];
  if (!sectionName) return;

  const section = config[sectionName];
  if (!section) {
    throw new ConfigurationError(`${sectionName} section is required`);
  }
  for (const field of ["resourceName", "networkName"] as const) {
    if (!section[field]) {
      throw new ConfigurationError(`${sectionName}.${field} is required`);
    }
  }
}
