/**
 * options.ts - Run options, as parsed from the command line
 *
 * The CLI (index.ts) turns flags into a LaunchOptions value and passes it to
 * the workflow. Nothing reads flags or environment variables after that
 * point, so a test can describe a whole run as one object literal.
 */

/** Per-technology requirement flags. Providers read the ones they own. */
export interface RequirementFlags {
  fabric?: string;
  deploymentType?: string;
  multirail?: boolean;
  spectrumX?: boolean;
  ai?: boolean;
}

export type LlmVendor = "openai" | "openai-azure" | "anthropic" | "gemini";

export const LLM_VENDORS: readonly LlmVendor[] = [
  "openai",
  "openai-azure",
  "anthropic",
  "gemini",
];

export interface LlmOptions {
  vendor: string;
  apiKey?: string;
  /** Base URL override; required for openai-azure. */
  apiUrl?: string;
  /** Model name; each vendor has a default. */
  model?: string;
}

export interface LaunchOptions {
  /** Provider names to activate, in order. */
  enabledPlugins: string[];

  /** Run cluster discovery. */
  discoverClusterConfig: boolean;
  /** Where discovery writes the config document. */
  saveClusterConfig?: string;
  /** A pre-supplied config document; disables discovery. */
  userConfig?: string;
  /** Defaults document that discovery starts from. */
  defaultsConfig: string;

  /** Catalog root. */
  profilesDir: string;

  requirements: RequirementFlags;

  /** Path of a file holding the user's free-text requirements. */
  prompt?: string;
  llmInteractive: boolean;
  llm: LlmOptions;

  /** Root directory for generated files; files land in <root>/<provider>/. */
  saveDeploymentFiles?: string;
  deploy: boolean;

  kubeconfig?: string;
}

/** Default defaults document, relative to the working directory. */
export const DEFAULT_DEFAULTS_CONFIG = "launch-config.yaml";

/**
 * Builds LaunchOptions with every default filled in.
 * Tests and the CLI override only what they care about.
 */
export function defaultLaunchOptions(overrides: Partial<LaunchOptions> = {}): LaunchOptions {
  return {
    enabledPlugins: ["network-operator"],
    discoverClusterConfig: false,
    defaultsConfig: DEFAULT_DEFAULTS_CONFIG,
    profilesDir: "profiles",
    requirements: {},
    llmInteractive: false,
    llm: { vendor: "anthropic" },
    deploy: false,
    ...overrides,
  };
}
