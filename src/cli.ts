/**
 * cli.ts - Command-line flags and how failures are reported
 *
 * Kept apart from index.ts so the flag mapping and the error report can be
 * tested without starting a run.
 */

import { Command, Option } from "commander";
import {
  ConfigurationError,
  ExtractionError,
  LowConfidenceRecommendationError,
  NoApplicableProfileError,
  ProviderError,
  UnknownProviderError,
  errorMessage,
} from "./errors";
import {
  DEFAULT_DEFAULTS_CONFIG,
  LLM_VENDORS,
  defaultLaunchOptions,
  type LaunchOptions,
} from "./options";
import { DEFAULT_PROFILES_DIR } from "./profiles";
import type { LogLevel, LoggerOptions } from "./utils/logger";

/** Flags as commander hands them over (camelCased long names). */
export interface CliFlags {
  discoverClusterConfig?: boolean;
  saveClusterConfig?: string;
  userConfig?: string;
  defaultsConfig: string;
  profilesDir: string;
  fabric?: string;
  deploymentType?: string;
  multirail?: boolean;
  spectrumX?: boolean;
  ai?: boolean;
  prompt?: string;
  llmInteractive?: boolean;
  llmVendor: string;
  llmModel?: string;
  llmApiKey?: string;
  llmApiUrl?: string;
  saveDeploymentFiles?: string;
  deploy?: boolean;
  kubeconfig?: string;
  enabledPlugins: string;
  logLevel: LogLevel;
  logFile?: string;
  enableLogging?: boolean;
}

export type Env = Record<string, string | undefined>;

/**
 * Environment variable holding the API key for a vendor, used when
 * --llm-api-key isn't given.
 */
export function apiKeyEnvVar(vendor: string): string | undefined {
  switch (vendor) {
    case "anthropic":
      return "ANTHROPIC_API_KEY";
    case "openai":
      return "OPENAI_API_KEY";
    case "openai-azure":
      return "AZURE_OPENAI_API_KEY";
    case "gemini":
      return "GOOGLE_API_KEY";
    default:
      return undefined;
  }
}

/** Splits "a, b,,c" into ["a", "b", "c"]. */
export function parsePluginList(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");
}

/**
 * Maps parsed flags onto run options.
 */
export function toLaunchOptions(flags: CliFlags, env: Env = process.env): LaunchOptions {
  const keyVar = apiKeyEnvVar(flags.llmVendor);

  return defaultLaunchOptions({
    enabledPlugins: parsePluginList(flags.enabledPlugins),
    discoverClusterConfig: flags.discoverClusterConfig ?? false,
    saveClusterConfig: flags.saveClusterConfig,
    userConfig: flags.userConfig,
    defaultsConfig: flags.defaultsConfig,
    profilesDir: flags.profilesDir,
    requirements: {
      fabric: flags.fabric,
      deploymentType: flags.deploymentType,
      multirail: flags.multirail,
      spectrumX: flags.spectrumX,
      ai: flags.ai,
    },
    prompt: flags.prompt,
    llmInteractive: flags.llmInteractive ?? false,
    llm: {
      vendor: flags.llmVendor,
      apiKey: flags.llmApiKey || (keyVar ? env[keyVar] : undefined),
      apiUrl: flags.llmApiUrl,
      model: flags.llmModel,
    },
    saveDeploymentFiles: flags.saveDeploymentFiles,
    deploy: flags.deploy ?? false,
    kubeconfig: flags.kubeconfig,
  });
}

/** Logging is on with --enable-logging, or implicitly when --log-file is set. */
export function toLoggerOptions(flags: CliFlags): LoggerOptions {
  return {
    enabled: Boolean(flags.enableLogging || flags.logFile),
    level: flags.logLevel,
    file: flags.logFile,
  };
}

/**
 * Builds the command. `action` receives the mapped options once commander
 * has validated the flags.
 */
export function buildProgram(
  action: (options: LaunchOptions, flags: CliFlags) => Promise<void>,
  env: Env = process.env
): Command {
  const program = new Command();

  program
    .name("fabric-launch")
    .description(
      "Discover a cluster's networking capabilities, pick a deployment profile and generate (or apply) its manifests"
    )
    .version("0.1.0")
    .option("--discover-cluster-config", "Discover cluster capabilities with every enabled plugin")
    .option("--save-cluster-config <path>", "Where to write the discovered cluster config")
    .option("--user-config <path>", "Use this cluster config instead of discovering one")
    .option(
      "--defaults-config <path>",
      "Defaults the discovered config starts from",
      DEFAULT_DEFAULTS_CONFIG
    )
    .option("--profiles-dir <path>", "Profile catalog directory", DEFAULT_PROFILES_DIR)
    .option("--fabric <fabric>", "Network fabric: ethernet or infiniband")
    .option("--deployment-type <type>", "Deployment type: sriov, hostdev or rdma_shared")
    .option("--multirail", "Use a multi-rail topology")
    .option("--spectrum-x", "Target a Spectrum-X fabric")
    .option("--ai", "Tune the deployment for AI workloads")
    .option("--prompt <path>", "File describing your requirements in plain language")
    .option("--llm-interactive", "Pick requirements in a chat with the model")
    .addOption(
      new Option("--llm-vendor <vendor>", "LLM vendor").choices(LLM_VENDORS).default("anthropic")
    )
    .option("--llm-model <model>", "Model name (the deployment name for openai-azure)")
    .option("--llm-api-key <key>", "API key (defaults to the vendor's environment variable)")
    .option("--llm-api-url <url>", "API base URL (required for openai-azure)")
    .option("--save-deployment-files <dir>", "Write generated files to <dir>/<plugin>/")
    .option("--deploy", "Apply the generated files to the cluster")
    .option("--kubeconfig <path>", "kubeconfig for kubectl")
    .option(
      "--enabled-plugins <names>",
      "Comma-separated plugins to run",
      "network-operator"
    )
    .addOption(
      new Option("--log-level <level>", "Log level")
        .choices(["debug", "info", "warn", "error"])
        .default("info")
    )
    .option("--log-file <path>", "Append log lines to this file")
    .option("--enable-logging", "Write log lines to stderr (or --log-file)")
    .action(async () => {
      const flags = program.opts<CliFlags>();
      await action(toLaunchOptions(flags, env), flags);
    });

  return program;
}

/** A failure as shown to the user. */
export interface FailureReport {
  title: string;
  message: string;
  hint?: string;
}

/**
 * Categorizes a failure by kind so the user knows what to fix.
 */
export function describeFailure(error: unknown): FailureReport {
  const message = errorMessage(error);

  if (error instanceof UnknownProviderError) {
    return { title: "Unknown plugin", message, hint: "Check --enabled-plugins." };
  }
  if (error instanceof NoApplicableProfileError) {
    return {
      title: "No matching profile",
      message,
      hint: "Adjust the requirements, or add a profile for this combination to the catalog.",
    };
  }
  if (error instanceof LowConfidenceRecommendationError) {
    return { title: "Recommendation not confident enough", message };
  }
  if (error instanceof ExtractionError) {
    return {
      title: "Could not read the model's answer",
      message,
      hint: "Rephrase the prompt, or pass --fabric and --deployment-type instead.",
    };
  }
  if (error instanceof ProviderError) {
    return {
      title: `Plugin ${error.providerName} failed`,
      message,
      hint: "Check cluster access (--kubeconfig) and the plugin's log lines (--enable-logging).",
    };
  }
  if (error instanceof ConfigurationError) {
    return { title: "Configuration error", message };
  }
  return { title: "Unexpected error", message };
}
