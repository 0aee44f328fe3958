/**
 * kubectl.ts - Cluster access through the kubectl binary
 *
 * How it works:
 * Providers talk to the cluster through a KubeClient, which runs kubectl as
 * a subprocess with an argument array. spawnSync never goes through a shell,
 * so a node name or path containing ";" or "$(...)" is passed to kubectl as
 * one literal argument.
 *
 * createKubeClient() binds a kubeconfig path once; every call then carries
 * `--kubeconfig <path>` without the caller repeating it. Tests swap the
 * whole client for a fake that returns canned output.
 *
 * Each execution gets a CLIENT span named "kubectl <operation> <resource>"
 * with the arguments, exit code and duration as attributes.
 */

import { spawnSync } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/**
 * Result from executing a kubectl command. isError follows the exit code,
 * not the output text.
 */
export interface KubectlResult {
  output: string;
  isError: boolean;
}

/** Executes kubectl with the given arguments. */
export type KubectlExecutor = (args: string[]) => KubectlResult;

/**
 * The cluster client handed to providers.
 */
export interface KubeClient {
  /** Runs kubectl; the kubeconfig flag is added automatically. */
  kubectl: KubectlExecutor;
  /** Kubeconfig in use, or undefined for kubectl's default. */
  kubeconfig?: string;
}

export interface KubeClientOptions {
  kubeconfig?: string;
  /** Per-command timeout in milliseconds. Defaults to 60 seconds. */
  timeoutMs?: number;
  /** Injectable executor for testing. Defaults to executeKubectl. */
  execute?: (args: string[], timeoutMs: number) => KubectlResult;
}

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Builds a KubeClient bound to a kubeconfig.
 */
export function createKubeClient(options: KubeClientOptions = {}): KubeClient {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const execute = options.execute ?? executeKubectl;
  const prefix = options.kubeconfig ? ["--kubeconfig", options.kubeconfig] : [];

  return {
    kubeconfig: options.kubeconfig,
    kubectl: (args) => execute([...prefix, ...args], timeoutMs),
  };
}

/**
 * Picks the operation and resource out of a kubectl argument list for span
 * naming, skipping a leading --kubeconfig pair.
 *
 *   ["get", "nodes", "-o", "json"]          → get / nodes
 *   ["apply", "-f", "out/network-operator"] → apply / -f
 */
export function describeKubectlArgs(args: string[]): { operation: string; resource: string } {
  const rest = args[0] === "--kubeconfig" ? args.slice(2) : args;
  return {
    operation: rest[0] || "unknown",
    resource: rest[1] || "unknown",
  };
}

/**
 * Executes a kubectl command and returns a structured result.
 *
 * Spawn failures (kubectl not installed) and non-zero exits both come back
 * as isError results rather than exceptions; callers decide what a failed
 * command means for them.
 *
 * @param args - Arguments after "kubectl"
 * @param timeoutMs - Kill the subprocess after this long
 */
export function executeKubectl(
  args: string[],
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): KubectlResult {
  const { operation, resource } = describeKubectlArgs(args);
  const command = `kubectl ${args.join(" ")}`;
  const startTime = Date.now();

  return getTracer().startActiveSpan(
    `kubectl ${operation} ${resource}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("k8s.client", "kubectl");
      span.setAttribute("k8s.operation", operation);
      span.setAttribute("process.executable.name", "kubectl");
      span.setAttribute("process.command_args", ["kubectl", ...args]);

      try {
        const result = spawnSync("kubectl", args, {
          encoding: "utf-8",
          timeout: timeoutMs,
          maxBuffer: 64 * 1024 * 1024,
        });
        span.setAttribute("k8s.duration_ms", Date.now() - startTime);

        if (result.error) {
          span.setAttribute("process.exit.code", -1);
          span.recordException(result.error);
          span.setStatus({ code: SpanStatusCode.ERROR, message: result.error.message });
          return {
            output: `Error executing "${command}": ${result.error.message}`,
            isError: true,
          };
        }

        span.setAttribute("process.exit.code", result.status ?? -1);
        if (result.status !== 0) {
          const errorMessage = result.stderr.trim() || "Unknown error";
          span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage });
          return {
            output: `Error executing "${command}": ${errorMessage}`,
            isError: true,
          };
        }

        span.setStatus({ code: SpanStatusCode.OK });
        return { output: result.stdout, isError: false };
      } finally {
        span.end();
      }
    }
  );
}
