/**
 * discovery.ts - What the cluster offers for NVIDIA networking
 *
 * Three kubectl queries, in order:
 * 1. Nodes - every node with a Mellanox PCI device (NFD label
 *    pci-15b3.present=true) is a worker node; its labels decide the sriov and
 *    rdma capability flags
 * 2. NicDevices - physical functions reported by the NIC configuration
 *    operator. Optional: the CRD may not be installed
 * 3. Deployments - where the network operator runs and at which version.
 *    Optional: the operator may not be installed yet
 *
 * A capability flag is true only when every worker node has it; a profile
 * must not assume SR-IOV on a cluster where half the nodes lack it.
 *
 * Parsing is split from querying so the parsers can be unit tested against
 * literal kubectl JSON.
 */

import { z } from "zod";
import { errorMessage } from "../../errors";
import type { ClusterConfigPatch, PfConfig } from "../../config/types";
import type { KubeClient } from "../../utils/kubectl";
import type { ProviderContext } from "../types";

/** NFD label set on nodes with a Mellanox (vendor 15b3) PCI device. */
export const MELLANOX_NODE_LABEL = "feature.node.kubernetes.io/pci-15b3.present";
export const SRIOV_CAPABLE_LABEL = "feature.node.kubernetes.io/network-sriov.capable";
export const RDMA_CAPABLE_LABEL = "feature.node.kubernetes.io/rdma.capable";

/** Default node selector written to the cluster config. */
export const DEFAULT_NODE_SELECTOR: Record<string, string> = {
  [MELLANOX_NODE_LABEL]: "true",
};

export const NIC_DEVICE_RESOURCE = "nicdevices.configuration.net.nvidia.com";
export const OPERATOR_DEPLOYMENT_SELECTOR = "app.kubernetes.io/name=network-operator";

// ---------------------------------------------------------------------------
// kubectl JSON shapes (only the fields read here)
// ---------------------------------------------------------------------------

const NodeListSchema = z.object({
  items: z
    .array(
      z.object({
        metadata: z.object({
          name: z.string(),
          labels: z.record(z.string()).default({}),
        }),
      })
    )
    .default([]),
});

const NicDeviceListSchema = z.object({
  items: z
    .array(
      z.object({
        status: z
          .object({
            node: z.string().default(""),
            ports: z
              .array(
                z.object({
                  pci: z.string(),
                  networkInterface: z.string().default(""),
                  rdmaInterface: z.string().default(""),
                })
              )
              .default([]),
          })
          .default({}),
      })
    )
    .default([]),
});

const DeploymentListSchema = z.object({
  items: z
    .array(
      z.object({
        metadata: z.object({
          name: z.string(),
          namespace: z.string().default(""),
        }),
        spec: z.object({
          template: z.object({
            spec: z.object({
              containers: z.array(z.object({ image: z.string().default("") })).default([]),
            }),
          }),
        }),
      })
    )
    .default([]),
});

export interface WorkerNode {
  name: string;
  labels: Record<string, string>;
}

/** Where the operator was found, if anywhere. */
export interface OperatorDeployment {
  deployed: boolean;
  namespace?: string;
  version?: string;
}

// ---------------------------------------------------------------------------
// Pure parsers (exported for unit testing)
// ---------------------------------------------------------------------------

function parseList<S extends z.ZodTypeAny>(schema: S, output: string, what: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    throw new Error(`failed to parse ${what} JSON: ${errorMessage(error)}`, { cause: error });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`unexpected ${what} JSON: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}

/** Parses `kubectl get nodes -o json`; nodes come back sorted by name. */
export function parseWorkerNodes(output: string): WorkerNode[] {
  return parseList(NodeListSchema, output, "node list")
    .items.map((item) => ({ name: item.metadata.name, labels: item.metadata.labels }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Parses `kubectl get nicdevices -A -o json` into physical functions,
 * one per device port, sorted by node then PCI address.
 */
export function parseNicDevices(output: string): PfConfig[] {
  const pfs: PfConfig[] = [];
  for (const device of parseList(NicDeviceListSchema, output, "NicDevice list").items) {
    for (const port of device.status.ports) {
      pfs.push({
        nodeName: device.status.node,
        pciAddress: port.pci,
        networkInterface: port.networkInterface,
        rdmaDevice: port.rdmaInterface,
      });
    }
  }
  return pfs.sort(
    (a, b) => a.nodeName.localeCompare(b.nodeName) || a.pciAddress.localeCompare(b.pciAddress)
  );
}

/**
 * Extracts the tag from a container image reference.
 *
 *   nvcr.io/nvidia/cloud-native/network-operator:v25.1.0 → v25.1.0
 *   registry:5000/network-operator                       → ""
 */
export function imageTag(image: string): string {
  const withoutDigest = image.split("@")[0];
  const lastSlash = withoutDigest.lastIndexOf("/");
  const lastColon = withoutDigest.lastIndexOf(":");
  return lastColon > lastSlash ? withoutDigest.slice(lastColon + 1) : "";
}

/** Parses the operator deployment list; the first deployment wins. */
export function parseOperatorDeployment(output: string): OperatorDeployment {
  const [deployment] = parseList(DeploymentListSchema, output, "deployment list").items;
  if (!deployment) return { deployed: false };

  const image = deployment.spec.template.spec.containers[0]?.image ?? "";
  return {
    deployed: true,
    namespace: deployment.metadata.namespace,
    version: imageTag(image),
  };
}

/**
 * Capability flags that hold across all worker nodes.
 *
 * - sriov: every node labelled SR-IOV capable
 * - rdma: every node labelled RDMA capable
 * - ib: some physical function is an IPoIB interface (named ib*)
 */
export function deriveNodeCapabilities(
  nodes: WorkerNode[],
  pfs: PfConfig[]
): Record<string, boolean> {
  const allNodesHave = (label: string) =>
    nodes.length > 0 && nodes.every((node) => node.labels[label] === "true");

  return {
    sriov: allNodesHave(SRIOV_CAPABLE_LABEL),
    rdma: allNodesHave(RDMA_CAPABLE_LABEL),
    ib: pfs.some((pf) => pf.networkInterface.startsWith("ib")),
  };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Runs discovery against the cluster.
 *
 * @throws Error when nodes can't be listed; the optional queries only warn
 */
export async function discoverNetworkCapabilities(
  ctx: ProviderContext,
  client: KubeClient
): Promise<ClusterConfigPatch> {
  ctx.signal.throwIfAborted();
  const nodesResult = client.kubectl([
    "get",
    "nodes",
    "-l",
    `${MELLANOX_NODE_LABEL}=true`,
    "-o",
    "json",
  ]);
  if (nodesResult.isError) {
    throw new Error(`failed to list nodes: ${nodesResult.output}`);
  }
  const nodes = parseWorkerNodes(nodesResult.output);
  ctx.logger.info("Discovered worker nodes", { count: nodes.length });
  if (nodes.length === 0) {
    ctx.ui.warning(`No nodes labelled ${MELLANOX_NODE_LABEL}=true were found`);
  }

  ctx.signal.throwIfAborted();
  let pfs: PfConfig[] = [];
  const nicResult = client.kubectl(["get", NIC_DEVICE_RESOURCE, "-A", "-o", "json"]);
  if (nicResult.isError) {
    ctx.logger.warn("NicDevice resources unavailable; skipping PF discovery", {
      error: nicResult.output,
    });
  } else {
    pfs = parseNicDevices(nicResult.output);
    ctx.logger.info("Discovered physical functions", { count: pfs.length });
  }

  ctx.signal.throwIfAborted();
  let operator: OperatorDeployment = { deployed: false };
  const deploymentResult = client.kubectl([
    "get",
    "deployments",
    "-A",
    "-l",
    OPERATOR_DEPLOYMENT_SELECTOR,
    "-o",
    "json",
  ]);
  if (deploymentResult.isError) {
    ctx.logger.warn("Could not look up the network operator deployment", {
      error: deploymentResult.output,
    });
  } else {
    operator = parseOperatorDeployment(deploymentResult.output);
    ctx.logger.info("Network operator deployment", { ...operator });
  }

  return {
    capabilities: { nodes: deriveNodeCapabilities(nodes, pfs) },
    workerNodes: nodes.map((node) => node.name),
    nodeSelector: { ...DEFAULT_NODE_SELECTOR },
    pfs,
    providers: { "network-operator": { ...operator } },
  };
}
