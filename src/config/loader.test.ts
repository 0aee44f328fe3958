/**
 * loader.test.ts - Unit tests for reading, writing and validating config
 *
 * Uses a temporary directory per test; nothing outside it is touched.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigurationError } from "../errors";
import {
  loadLaunchConfig,
  parseLaunchConfig,
  saveLaunchConfig,
  validateLaunchConfig,
} from "./loader";
import type { LaunchConfig } from "./types";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fabric-launch-config-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

/** A config that passes validation for every deployment type. */
function makeConfig(overrides: Partial<LaunchConfig> = {}): LaunchConfig {
  return {
    networkOperator: {
      version: "v25.4.0",
      componentVersion: "network-operator-v25.4.0",
      repository: "nvcr.io/nvidia/mellanox",
      namespace: "nvidia-network-operator",
    },
    sriov: {
      ethernetMtu: 9000,
      infinibandMtu: 4000,
      numVfs: 8,
      priority: 90,
      resourceName: "sriov_resource",
      networkName: "sriov-network",
    },
    hostdev: { resourceName: "hostdev_resource", networkName: "hostdev-network" },
    rdmaShared: { resourceName: "rdma_resource", networkName: "rdma-network" },
    ...overrides,
  };
}

describe("parseLaunchConfig", () => {
  it("fills section defaults", () => {
    const config = parseLaunchConfig("sriov:\n  resourceName: r\n", "test.yaml");

    expect(config.sriov).toEqual({
      ethernetMtu: 9000,
      infinibandMtu: 4000,
      numVfs: 8,
      priority: 90,
      resourceName: "r",
      networkName: "",
    });
    expect(config.requirements).toBeUndefined();
  });

  it("treats an empty document as an empty config", () => {
    expect(parseLaunchConfig("", "empty.yaml")).toEqual({});
  });

  it("reports malformed YAML with the source", () => {
    expect(() => parseLaunchConfig("a: [1,", "broken.yaml")).toThrow(
      /^failed to parse cluster config YAML broken\.yaml/
    );
  });

  it("reports schema violations with the field path", () => {
    expect(() => parseLaunchConfig("sriov:\n  numVfs: many\n", "bad.yaml")).toThrow(
      /^invalid cluster config bad\.yaml: sriov\.numVfs: /
    );
  });

  it("reads requirements and cluster capabilities", () => {
    const config = parseLaunchConfig(
      [
        "requirements:",
        "  fabric: ethernet",
        "  deployment: sriov",
        "  features:",
        "    multirail: true",
        "clusterConfig:",
        "  capabilities:",
        "    nodes:",
        "      sriov: true",
        "  workerNodes: [node-a]",
      ].join("\n"),
      "full.yaml"
    );

    expect(config.requirements).toEqual({
      fabric: "ethernet",
      deployment: "sriov",
      features: { multirail: true },
    });
    expect(config.clusterConfig?.capabilities.nodes).toEqual({ sriov: true });
    expect(config.clusterConfig?.workerNodes).toEqual(["node-a"]);
    expect(config.clusterConfig?.pfs).toEqual([]);
  });
});

describe("loadLaunchConfig", () => {
  it("rejects an empty path", () => {
    expect(() => loadLaunchConfig("")).toThrow("no cluster configuration path provided");
  });

  it("rejects a missing file", () => {
    const missing = path.join(tmpDir, "nope.yaml");
    expect(() => loadLaunchConfig(missing)).toThrow(
      `cluster configuration file ${missing} does not exist`
    );
  });

  it("round-trips through saveLaunchConfig", () => {
    const file = path.join(tmpDir, "nested", "cluster.yaml");
    const config = makeConfig();

    saveLaunchConfig(file, config);

    expect(loadLaunchConfig(file)).toEqual(config);
  });
});

describe("validateLaunchConfig", () => {
  it("accepts a complete config for every deployment type", () => {
    for (const deployment of ["sriov", "hostdev", "rdma_shared"]) {
      expect(() => validateLaunchConfig(makeConfig(), deployment)).not.toThrow();
    }
  });

  it("requires the networkOperator section", () => {
    expect(() =>
      validateLaunchConfig(makeConfig({ networkOperator: undefined }), "sriov")
    ).toThrow("networkOperator section is required");
  });

  it("names the first missing operator field", () => {
    const config = makeConfig({
      networkOperator: {
        version: "v25.4.0",
        componentVersion: "network-operator-v25.4.0",
        repository: "",
        namespace: "nvidia-network-operator",
      },
    });

    expect(() => validateLaunchConfig(config, "sriov")).toThrow(
      "networkOperator.repository is required"
    );
  });

  it("names the missing field of the deployment's section", () => {
    const config = makeConfig({ hostdev: { resourceName: "", networkName: "n" } });

    expect(() => validateLaunchConfig(config, "hostdev")).toThrow(
      "hostdev.resourceName is required"
    );
  });

  it("maps rdma_shared to the rdmaShared section", () => {
    const validate = () =>
      validateLaunchConfig(makeConfig({ rdmaShared: undefined }), "rdma_shared");

    expect(validate).toThrow(ConfigurationError);
    expect(validate).toThrow("rdmaShared section is required");
  });

  it("ignores sections other deployments need", () => {
    expect(() =>
      validateLaunchConfig(makeConfig({ sriov: undefined }), "hostdev")
    ).not.toThrow();
  });
});
