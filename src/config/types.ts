/**
 * types.ts - Shapes of the launch configuration document
 *
 * The config document is the one file that survives between runs. Discovery
 * writes it, the user may edit it, and every later phase reads it:
 *
 *   networkOperator / sriov / hostdev / rdmaShared  static operator settings
 *   requirements                                    optional, pre-selected requirements
 *   clusterConfig                                   discovered cluster capabilities
 *
 * Each shape is a Zod schema with the TypeScript type derived from it, so the
 * YAML on disk and the objects in memory can't drift apart.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Requirements
// ---------------------------------------------------------------------------

/**
 * Desired networking state for a run.
 *
 * fabric and deployment are plain strings because providers own their
 * vocabularies (the network-operator provider validates them). Feature flags
 * are open-ended for the same reason; a flag that is not set reads as false.
 */
export const RequirementsSchema = z.object({
  fabric: z.string().default(""),
  deployment: z.string().default(""),
  features: z.record(z.boolean()).default({}),
});

export type RequirementsDescriptor = z.infer<typeof RequirementsSchema>;

/**
 * The slice of requirements a single provider contributes.
 * The orchestrator merges patches and rejects overlaps.
 */
export type RequirementsPatch = {
  fabric?: string;
  deployment?: string;
  features?: Record<string, boolean>;
};

// ---------------------------------------------------------------------------
// Cluster capabilities
// ---------------------------------------------------------------------------

/** A physical function on a worker node's NIC. */
export const PfConfigSchema = z.object({
  nodeName: z.string().default(""),
  pciAddress: z.string(),
  networkInterface: z.string().default(""),
  rdmaDevice: z.string().default(""),
});

export type PfConfig = z.infer<typeof PfConfigSchema>;

/**
 * Everything discovery learns about the cluster.
 *
 * capabilities.nodes holds hardware flags (sriov, rdma, ib, ...) that hold
 * across all worker nodes. providers holds free-form sections keyed by
 * provider name, for facts only that provider understands.
 */
export const ClusterConfigSchema = z.object({
  capabilities: z
    .object({
      nodes: z.record(z.boolean()).default({}),
    })
    .default({}),
  pfs: z.array(PfConfigSchema).default([]),
  workerNodes: z.array(z.string()).default([]),
  nodeSelector: z.record(z.string()).default({}),
  providers: z.record(z.record(z.unknown())).default({}),
});

export type ClusterConfig = z.infer<typeof ClusterConfigSchema>;

/** The part of ClusterConfig that profile capability predicates are checked against. */
export type CapabilitiesDescriptor = ClusterConfig["capabilities"];

/**
 * A provider's contribution to ClusterConfig. Every field is optional so a
 * provider only names what it discovered.
 */
export type ClusterConfigPatch = {
  capabilities?: { nodes?: Record<string, boolean> };
  pfs?: PfConfig[];
  workerNodes?: string[];
  nodeSelector?: Record<string, string>;
  providers?: Record<string, Record<string, unknown>>;
};

// ---------------------------------------------------------------------------
// Static operator settings
// ---------------------------------------------------------------------------

export const NetworkOperatorConfigSchema = z.object({
  version: z.string().default(""),
  componentVersion: z.string().default(""),
  repository: z.string().default(""),
  namespace: z.string().default(""),
});

export const SriovConfigSchema = z.object({
  ethernetMtu: z.number().int().positive().default(9000),
  infinibandMtu: z.number().int().positive().default(4000),
  numVfs: z.number().int().nonnegative().default(8),
  priority: z.number().int().default(90),
  resourceName: z.string().default(""),
  networkName: z.string().default(""),
});

/** Shared by the host-device and RDMA-shared sections. */
export const ResourceNetworkConfigSchema = z.object({
  resourceName: z.string().default(""),
  networkName: z.string().default(""),
});

export type NetworkOperatorConfig = z.infer<typeof NetworkOperatorConfigSchema>;
export type SriovConfig = z.infer<typeof SriovConfigSchema>;
export type ResourceNetworkConfig = z.infer<typeof ResourceNetworkConfigSchema>;

// ---------------------------------------------------------------------------
// The full document
// ---------------------------------------------------------------------------

export const LaunchConfigSchema = z.object({
  networkOperator: NetworkOperatorConfigSchema.optional(),
  sriov: SriovConfigSchema.optional(),
  hostdev: ResourceNetworkConfigSchema.optional(),
  rdmaShared: ResourceNetworkConfigSchema.optional(),
  requirements: RequirementsSchema.optional(),
  clusterConfig: ClusterConfigSchema.optional(),
});

export type LaunchConfig = z.infer<typeof LaunchConfigSchema>;
