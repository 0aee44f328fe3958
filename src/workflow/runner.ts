/**
 * runner.ts - The launch workflow
 *
 * One run goes through these phases, strictly in order and one provider at
 * a time:
 *
 *   init          build the provider registry, check flag combinations
 *   discovery     (optional) query the cluster, write the config document
 *   requirements  decide what the user wants: config, flags, prompt or chat
 *   resolution    pick one catalog profile per provider
 *   generation    render each profile; write files when a directory is set
 *   deployment    (optional) apply the written files
 *
 * Any failure stops the run. Errors leave here as LaunchKitErrors tagged with
 * the phase they happened in; files already written stay on disk.
 *
 * Every phase and every provider call gets its own span under a root
 * "fabric-launch.workflow" span.
 */

import * as path from "path";
import {
  ConfigurationError,
  LaunchKitError,
  WorkflowError,
  asProviderError,
  tagPhase,
} from "../errors";
import { loadLaunchConfig, saveLaunchConfig } from "../config/loader";
import {
  freezeRequirements,
  mergeClusterConfig,
  mergeRequirements,
  type OwnershipMap,
} from "../config/merge";
import {
  ClusterConfigSchema,
  type ClusterConfig,
  type LaunchConfig,
  type RequirementsDescriptor,
  type RequirementsPatch,
} from "../config/types";
import { createLlmCompletion, type LlmCompletion } from "../llm/completion";
import type { LlmFields } from "../llm/extract";
import { buildSystemPrompt, readPromptFile } from "../llm/prompt";
import { selectProfileFromPrompt } from "../llm/select";
import { ChatSession } from "../llm/session";
import type { LaunchOptions } from "../options";
import { findApplicableProfile } from "../profiles";
import type { ResolvedProfile } from "../profiles/types";
import { buildRegistry, providerFor } from "../providers/registry";
import type { CapabilityProvider, ProviderContext } from "../providers/types";
import { withSpan } from "../tracing";
import { createSilentOutput } from "../ui";
import { createKubeClient, type KubeClient } from "../utils/kubectl";
import { silentLogger } from "../utils/logger";
import { writeDeploymentFiles } from "./files";
import { runInteractiveSession } from "./interactive";
import type {
  RequirementsSource,
  WorkflowDependencies,
  WorkflowPhase,
  WorkflowResult,
} from "./types";

interface AcquiredRequirements {
  requirements: RequirementsDescriptor;
  source: RequirementsSource;
}

/**
 * Runs the launch workflow.
 *
 * @param options - Parsed CLI options
 * @param deps - Collaborators; defaults are the real kubectl and LLM backends
 * @returns A summary; status "skipped" when nothing asked for requirements
 * @throws LaunchKitError tagged with the failing phase
 */
export async function runWorkflow(
  options: LaunchOptions,
  deps: WorkflowDependencies = {}
): Promise<WorkflowResult> {
  const logger = deps.logger ?? silentLogger;
  const ui = deps.ui ?? createSilentOutput();
  const signal = deps.signal ?? new AbortController().signal;
  const ctx: ProviderContext = { signal, logger, ui };

  const newKubeClient =
    deps.createKubeClient ?? ((kubeconfig?: string) => createKubeClient({ kubeconfig }));
  const newCompletion = deps.createCompletion ?? createLlmCompletion;

  const phases: WorkflowPhase[] = [];

  /** Runs one phase in its own span and tags whatever it throws. */
  const phase = <T>(name: WorkflowPhase, fn: () => Promise<T>): Promise<T> =>
    withSpan(`fabric-launch.phase.${name}`, { "workflow.phase": name }, async () => {
      signal.throwIfAborted();
      logger.debug("Entering phase", { phase: name });
      const result = await fn();
      phases.push(name);
      return result;
    }).catch((error: unknown) => {
      const failure = error instanceof LaunchKitError ? error : new WorkflowError(error);
      throw tagPhase(failure, name);
    });

  /** Runs one provider call in a span, normalizing what it throws. */
  const call = <T>(
    provider: CapabilityProvider,
    operation: string,
    fn: () => Promise<T>
  ): Promise<T> => {
    const { name } = provider.identity();
    return withSpan(
      `fabric-launch.provider.${operation}`,
      { "provider.name": name, "provider.operation": operation },
      fn
    ).catch((error: unknown) => {
      throw asProviderError(error, name, operation);
    });
  };

  /** Synchronous provider calls get the same error normalization. */
  const callSync = <T>(provider: CapabilityProvider, operation: string, fn: () => T): T => {
    try {
      return fn();
    } catch (error) {
      throw asProviderError(error, provider.identity().name, operation);
    }
  };

  return withSpan("fabric-launch.workflow", {}, async (rootSpan) => {
    ui.header("fabric-launch");

    // -----------------------------------------------------------------------
    // init
    // -----------------------------------------------------------------------
    const registry = await phase("init", async () => {
      if (options.deploy && !options.saveDeploymentFiles) {
        throw new ConfigurationError(
          "--deploy requires a directory for the generated files (--save-deployment-files)"
        );
      }
      const built = buildRegistry(options.enabledPlugins, deps.providers);
      logger.info("Enabled plugins", { plugins: [...built.keys()].join(",") });
      return built;
    });
    rootSpan.setAttribute("workflow.plugins", [...registry.keys()]);

    let kubeClient: KubeClient | null = null;
    const getKubeClient = () => {
      if (!kubeClient) kubeClient = newKubeClient(options.kubeconfig);
      return kubeClient;
    };

    // -----------------------------------------------------------------------
    // discovery
    // -----------------------------------------------------------------------
    let configPath = options.userConfig ?? "";

    if (options.discoverClusterConfig && options.userConfig) {
      ui.info(`Using the provided cluster config ${options.userConfig}; skipping discovery`);
    } else if (options.discoverClusterConfig) {
      configPath = await phase("discovery", async () => {
        const savePath = options.saveClusterConfig;
        if (!savePath) {
          throw new ConfigurationError(
            "no output path for the discovered cluster config (use --save-cluster-config)"
          );
        }

        ui.section("Discovering cluster capabilities");
        const defaults = loadLaunchConfig(options.defaultsConfig, logger);
        const client = getKubeClient();
        const owners: OwnershipMap = new Map();
        let clusterConfig: ClusterConfig = ClusterConfigSchema.parse({});

        for (const provider of registry.values()) {
          const { name } = provider.identity();
          const progress = ui.startProgress(`Discovering with plugin ${name}`);
          try {
            const patch = await call(provider, "discover capabilities", () =>
              provider.discoverCapabilities(ctx, client)
            );
            clusterConfig = mergeClusterConfig(clusterConfig, patch, name, owners);
            progress.succeed(`Plugin ${name} discovery complete`);
          } catch (error) {
            progress.fail(`Plugin ${name} discovery failed`);
            throw error;
          }
        }

        const document: LaunchConfig = {
          ...defaults,
          requirements: undefined,
          clusterConfig,
        };
        saveLaunchConfig(savePath, document, logger);
        ui.success(`Cluster config saved to ${savePath}`);
        return savePath;
      });
    }

    // -----------------------------------------------------------------------
    // requirements
    // -----------------------------------------------------------------------
    const providers = [...registry.values()];
    const allFromFlags = providers.every((provider) =>
      provider.hasRequirementsFromOptions(options)
    );

    if (!allFromFlags && !options.prompt && !options.llmInteractive) {
      ui.info(
        "No requirements given (flags, --prompt or --llm-interactive); nothing to generate"
      );
      logger.info("Requirements not provided; stopping after discovery");
      return { status: "skipped", phases, configPath };
    }

    async function acquireRequirements(
      loaded: LaunchConfig,
      fromFlags: boolean
    ): Promise<AcquiredRequirements> {
      if (loaded.requirements) {
        return { requirements: freezeRequirements(loaded.requirements), source: "config" };
      }

      if (fromFlags) {
        return {
          requirements: mergeRequirements(
            providers.map((provider) => ({
              owner: provider.identity().name,
              patch: callSync(provider, "build requirements", () =>
                provider.buildRequirementsFromOptions(options)
              ),
            }))
          ),
          source: "flags",
        };
      }

      const clusterConfig = loaded.clusterConfig ?? ClusterConfigSchema.parse({});
      const systemPrompt = buildSystemPrompt(
        clusterConfig,
        providers.map((provider) =>
          callSync(provider, "build its prompt addendum", () => provider.getSystemPromptAddendum())
        ),
        deps.systemPromptTemplate
      );
      const completion: LlmCompletion = newCompletion(options.llm);

      if (options.llmInteractive) {
        let patches: Array<{ owner: string; patch: RequirementsPatch }> = [];
        await runInteractiveSession(new ChatSession(completion, systemPrompt), {
          ui,
          signal,
          logger,
          accept: (fields) => {
            patches = patchesFromLlm(fields);
          },
        });
        return { requirements: mergeRequirements(patches), source: "interactive" };
      }

      // Reaching here means a prompt file was given.
      const promptText = readPromptFile(options.prompt ?? "");
      const progress = ui.startProgress("Asking the model for a profile recommendation");
      let fields: LlmFields;
      try {
        fields = await selectProfileFromPrompt(promptText, systemPrompt, completion, {
          signal,
          logger,
        });
        progress.succeed("Recommendation received");
      } catch (error) {
        progress.fail("No usable recommendation");
        throw error;
      }
      return { requirements: mergeRequirements(patchesFromLlm(fields)), source: "prompt" };
    }

    function patchesFromLlm(
      fields: LlmFields
    ): Array<{ owner: string; patch: RequirementsPatch }> {
      return providers.map((provider) => ({
        owner: provider.identity().name,
        patch: callSync(provider, "read the recommendation", () =>
          provider.buildRequirementsFromLlmResponse(fields)
        ),
      }));
    }

    const { config, acquired } = await phase("requirements", async () => {
      const loaded = loadLaunchConfig(configPath, logger);
      const result = await acquireRequirements(loaded, allFromFlags);
      ui.section("Requirements");
      ui.info(describeRequirements(result.requirements));
      logger.info("Selected requirements", {
        source: result.source,
        requirements: result.requirements,
      });
      return { config: loaded, acquired: result };
    });
    const { requirements } = acquired;

    // -----------------------------------------------------------------------
    // resolution
    // -----------------------------------------------------------------------
    const capabilities = (config.clusterConfig ?? ClusterConfigSchema.parse({})).capabilities;

    const profiles = await phase("resolution", async () => {
      ui.section("Selecting profiles");
      const resolved: Record<string, ResolvedProfile> = {};
      for (const provider of providers) {
        const { name } = provider.identity();
        const profile = findApplicableProfile(requirements, capabilities, name, {
          profilesDir: options.profilesDir,
          logger,
        });
        ui.success(`Plugin ${name}: profile ${profile.name}`);
        resolved[name] = profile;
      }
      return resolved;
    });

    // -----------------------------------------------------------------------
    // generation
    // -----------------------------------------------------------------------
    const outputDirFor = (providerName: string) =>
      path.join(options.saveDeploymentFiles ?? "", providerName);

    const generated = await phase("generation", async () => {
      ui.section("Generating deployment files");
      const fileNames: Record<string, string[]> = {};

      for (const profile of Object.values(profiles)) {
        const provider = providerFor(registry, profile.provider);
        const files = await call(provider, "generate files", () =>
          provider.generateFiles(ctx, profile, { config, requirements })
        );
        fileNames[profile.provider] = Object.keys(files);

        if (options.saveDeploymentFiles) {
          const outputDir = outputDirFor(profile.provider);
          writeDeploymentFiles(files, outputDir, logger);
          ui.success(`Wrote ${Object.keys(files).length} files to ${outputDir}`);
        } else {
          ui.info(
            `Generated ${Object.keys(files).join(", ")} for ${profile.provider} ` +
              "(use --save-deployment-files to write them)"
          );
        }
      }
      return fileNames;
    });

    // -----------------------------------------------------------------------
    // deployment
    // -----------------------------------------------------------------------
    if (options.deploy) {
      await phase("deployment", async () => {
        ui.section("Deploying");
        const client = getKubeClient();
        for (const profile of Object.values(profiles)) {
          const provider = providerFor(registry, profile.provider);
          const progress = ui.startProgress(`Deploying profile ${profile.name}`);
          try {
            await call(provider, "deploy", () =>
              provider.deploy(ctx, profile, client, outputDirFor(profile.provider))
            );
            progress.succeed(`Deployed profile ${profile.name}`);
          } catch (error) {
            progress.fail(`Deployment of profile ${profile.name} failed`);
            throw error;
          }
        }
      });
    }

    ui.success("Done");
    return {
      status: "done",
      phases,
      configPath,
      requirements,
      requirementsSource: acquired.source,
      profiles,
      generated,
    };
  });
}

/**
 * One-line summary shown to the user, e.g.
 * "fabric=ethernet deployment=sriov multirail=true".
 */
export function describeRequirements(requirements: RequirementsDescriptor): string {
  const parts = [
    `fabric=${requirements.fabric || "(unset)"}`,
    `deployment=${requirements.deployment || "(unset)"}`,
    ...Object.entries(requirements.features)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([flag, value]) => `${flag}=${value}`),
  ];
  return parts.join(" ");
}
