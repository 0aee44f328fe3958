/**
 * files.ts - Writing generated files to disk
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigurationError, errorMessage } from "../errors";
import { silentLogger, type Logger } from "../utils/logger";

/**
 * Replaces the contents of a provider's output directory.
 *
 * The directory is removed first, so files from an earlier run with a
 * different profile don't linger and get applied by `kubectl apply -f`.
 *
 * @param files - File name → content; names must be plain basenames
 * @param outputDir - Usually <saveDeploymentFiles>/<provider>
 * @returns The written paths, in input order
 * @throws ConfigurationError for a name with a path component or a write failure
 */
export function writeDeploymentFiles(
  files: Record<string, string>,
  outputDir: string,
  logger: Logger = silentLogger
): string[] {
  for (const name of Object.keys(files)) {
    if (name === "" || path.basename(name) !== name || name === "." || name === "..") {
      throw new ConfigurationError(`invalid generated file name "${name}"`);
    }
  }

  const written: string[] = [];
  try {
    fs.rmSync(outputDir, { recursive: true, force: true });
    fs.mkdirSync(outputDir, { recursive: true });

    for (const [name, content] of Object.entries(files)) {
      const filePath = path.join(outputDir, name);
      fs.writeFileSync(filePath, content, "utf8");
      logger.info("Saved deployment file", { file: filePath });
      written.push(filePath);
    }
  } catch (error) {
    throw new ConfigurationError(
      `failed to write deployment files to ${outputDir}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return written;
}
