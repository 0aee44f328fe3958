/**
 * discovery.test.ts - Unit tests for network-operator cluster discovery
 *
 * kubectl is replaced by a KubeClient that answers from a table of canned
 * outputs keyed by the joined argument list.
 */

import { describe, it, expect, vi } from "vitest";
import { createSilentOutput } from "../../ui";
import type { KubeClient, KubectlResult } from "../../utils/kubectl";
import { silentLogger } from "../../utils/logger";
import type { ProviderContext } from "../types";
import {
  deriveNodeCapabilities,
  discoverNetworkCapabilities,
  imageTag,
  parseNicDevices,
  parseOperatorDeployment,
  parseWorkerNodes,
  MELLANOX_NODE_LABEL,
  RDMA_CAPABLE_LABEL,
  SRIOV_CAPABLE_LABEL,
  type WorkerNode,
} from "./discovery";

const NODES_ARGS = `get nodes -l ${MELLANOX_NODE_LABEL}=true -o json`;
const NIC_ARGS = "get nicdevices.configuration.net.nvidia.com -A -o json";
const DEPLOYMENT_ARGS =
  "get deployments -A -l app.kubernetes.io/name=network-operator -o json";

function ok(output: unknown): KubectlResult {
  return { output: JSON.stringify(output), isError: false };
}

function failed(output: string): KubectlResult {
  return { output, isError: true };
}

function makeFakeClient(responses: Record<string, KubectlResult>) {
  const calls: string[] = [];
  const client: KubeClient = {
    kubectl: (args) => {
      const key = args.join(" ");
      calls.push(key);
      return responses[key] ?? failed(`unexpected command: ${key}`);
    },
  };
  return { client, calls };
}

function makeContext(overrides: Partial<ProviderContext> = {}): ProviderContext {
  return {
    signal: new AbortController().signal,
    logger: silentLogger,
    ui: createSilentOutput(),
    ...overrides,
  };
}

function makeNode(name: string, labels: Record<string, string> = {}) {
  return { metadata: { name, labels } };
}

const capableLabels = { [SRIOV_CAPABLE_LABEL]: "true", [RDMA_CAPABLE_LABEL]: "true" };

const nicDevices = {
  items: [
    {
      status: {
        node: "node-b",
        ports: [{ pci: "0000:08:00.0", networkInterface: "ens8f0", rdmaInterface: "mlx5_2" }],
      },
    },
    {
      status: {
        node: "node-a",
        ports: [
          { pci: "0000:08:00.1", networkInterface: "ens8f1", rdmaInterface: "mlx5_1" },
          { pci: "0000:08:00.0", networkInterface: "ens8f0", rdmaInterface: "mlx5_0" },
        ],
      },
    },
  ],
};

const operatorDeployments = {
  items: [
    {
      metadata: { name: "network-operator", namespace: "nvidia-network-operator" },
      spec: {
        template: {
          spec: {
            containers: [{ image: "nvcr.io/nvidia/cloud-native/network-operator:v25.4.0" }],
          },
        },
      },
    },
  ],
};

describe("parsers", () => {
  it("sorts worker nodes by name", () => {
    const nodes = parseWorkerNodes(
      JSON.stringify({ items: [makeNode("node-b"), makeNode("node-a", { zone: "a" })] })
    );

    expect(nodes).toEqual([
      { name: "node-a", labels: { zone: "a" } },
      { name: "node-b", labels: {} },
    ]);
  });

  it("reports output that is not JSON", () => {
    expect(() => parseWorkerNodes("error: the server doesn't have a resource type")).toThrow(
      /^failed to parse node list JSON: /
    );
  });

  it("reports JSON of the wrong shape", () => {
    expect(() => parseWorkerNodes(JSON.stringify({ items: [{ metadata: {} }] }))).toThrow(
      /^unexpected node list JSON: /
    );
  });

  it("turns each NIC port into a PF sorted by node and PCI address", () => {
    expect(parseNicDevices(JSON.stringify(nicDevices))).toEqual([
      {
        nodeName: "node-a",
        pciAddress: "0000:08:00.0",
        networkInterface: "ens8f0",
        rdmaDevice: "mlx5_0",
      },
      {
        nodeName: "node-a",
        pciAddress: "0000:08:00.1",
        networkInterface: "ens8f1",
        rdmaDevice: "mlx5_1",
      },
      {
        nodeName: "node-b",
        pciAddress: "0000:08:00.0",
        networkInterface: "ens8f0",
        rdmaDevice: "mlx5_2",
      },
    ]);
  });

  it("extracts image tags", () => {
    expect(imageTag("nvcr.io/nvidia/cloud-native/network-operator:v25.4.0")).toBe("v25.4.0");
    expect(imageTag("registry:5000/network-operator")).toBe("");
    expect(imageTag("repo/operator:v1@sha256:abc")).toBe("v1");
  });

  it("reads the operator namespace and version", () => {
    expect(parseOperatorDeployment(JSON.stringify(operatorDeployments))).toEqual({
      deployed: true,
      namespace: "nvidia-network-operator",
      version: "v25.4.0",
    });
    expect(parseOperatorDeployment(JSON.stringify({ items: [] }))).toEqual({ deployed: false });
  });
});

describe("deriveNodeCapabilities", () => {
  const capable: WorkerNode = { name: "a", labels: capableLabels };

  it("sets a flag only when every node has the label", () => {
    const partial: WorkerNode = { name: "b", labels: { [SRIOV_CAPABLE_LABEL]: "true" } };

    expect(deriveNodeCapabilities([capable, partial], [])).toEqual({
      sriov: true,
      rdma: false,
      ib: false,
    });
  });

  it("reports nothing for an empty cluster", () => {
    expect(deriveNodeCapabilities([], [])).toEqual({ sriov: false, rdma: false, ib: false });
  });

  it("detects InfiniBand from IPoIB interface names", () => {
    const pfs = [
      { nodeName: "a", pciAddress: "0000:08:00.0", networkInterface: "ibp8s0f0", rdmaDevice: "" },
    ];

    expect(deriveNodeCapabilities([capable], pfs).ib).toBe(true);
  });
});

describe("discoverNetworkCapabilities", () => {
  it("combines nodes, PFs and the operator deployment", async () => {
    const { client, calls } = makeFakeClient({
      [NODES_ARGS]: ok({
        items: [makeNode("node-b", capableLabels), makeNode("node-a", capableLabels)],
      }),
      [NIC_ARGS]: ok(nicDevices),
      [DEPLOYMENT_ARGS]: ok(operatorDeployments),
    });

    const patch = await discoverNetworkCapabilities(makeContext(), client);

    expect(calls).toEqual([NODES_ARGS, NIC_ARGS, DEPLOYMENT_ARGS]);
    expect(patch.capabilities).toEqual({ nodes: { sriov: true, rdma: true, ib: false } });
    expect(patch.workerNodes).toEqual(["node-a", "node-b"]);
    expect(patch.nodeSelector).toEqual({ [MELLANOX_NODE_LABEL]: "true" });
    expect(patch.pfs).toHaveLength(3);
    expect(patch.providers).toEqual({
      "network-operator": {
        deployed: true,
        namespace: "nvidia-network-operator",
        version: "v25.4.0",
      },
    });
  });

  it("continues without PFs or operator when those queries fail", async () => {
    const { client } = makeFakeClient({
      [NODES_ARGS]: ok({ items: [makeNode("node-a", capableLabels)] }),
      [NIC_ARGS]: failed("the server doesn't have a resource type"),
      [DEPLOYMENT_ARGS]: failed("forbidden"),
    });

    const patch = await discoverNetworkCapabilities(makeContext(), client);

    expect(patch.pfs).toEqual([]);
    expect(patch.providers).toEqual({ "network-operator": { deployed: false } });
  });

  it("fails when nodes cannot be listed", async () => {
    const { client } = makeFakeClient({ [NODES_ARGS]: failed("connection refused") });

    await expect(discoverNetworkCapabilities(makeContext(), client)).rejects.toThrow(
      "failed to list nodes: connection refused"
    );
  });

  it("warns when no Mellanox nodes are labelled", async () => {
    const warning = vi.fn();
    const { client } = makeFakeClient({
      [NODES_ARGS]: ok({ items: [] }),
      [NIC_ARGS]: ok({ items: [] }),
      [DEPLOYMENT_ARGS]: ok({ items: [] }),
    });

    await discoverNetworkCapabilities(
      makeContext({ ui: { ...createSilentOutput(), warning } }),
      client
    );

    expect(warning).toHaveBeenCalledWith(`No nodes labelled ${MELLANOX_NODE_LABEL}=true were found`);
  });

  it("stops before querying when the run is already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { client, calls } = makeFakeClient({});

    await expect(
      discoverNetworkCapabilities(makeContext({ signal: controller.signal }), client)
    ).rejects.toThrow();
    expect(calls).toEqual([]);
  });
});
