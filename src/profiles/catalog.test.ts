/**
 * catalog.test.ts - Unit tests for reading the profile catalog from disk
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigurationError, NoApplicableProfileError } from "../errors";
import { findApplicableProfile, loadCatalog, parseProfileManifest } from "./catalog";

const SHIPPED_PROFILES = path.resolve(__dirname, "..", "..", "profiles");

let catalogDir: string;

beforeEach(() => {
  catalogDir = fs.mkdtempSync(path.join(os.tmpdir(), "fabric-launch-catalog-"));
});

afterEach(() => {
  fs.rmSync(catalogDir, { recursive: true, force: true });
});

/** Writes one catalog entry directory holding the given manifest lines. */
function writeEntry(entryName: string, manifest: string[]): void {
  const directory = path.join(catalogDir, entryName);
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(path.join(directory, "profile.yaml"), manifest.join("\n") + "\n");
}

const SRIOV_ETHERNET = [
  "provider: network-operator",
  "profileRequirements:",
  "  fabric: ethernet",
  "  deployment: sriov",
  "nodeCapabilities:",
  "  sriov: true",
];

describe("parseProfileManifest", () => {
  it("splits string predicates from feature flags and drops wildcards", () => {
    const definition = parseProfileManifest(
      [
        "provider: network-operator",
        "profileRequirements:",
        "  fabric: infiniband",
        "  deployment: ''",
        "  multirail: true",
        "  ai: null",
        "nodeCapabilities:",
        "  ib: true",
        "  rdma: null",
      ].join("\n"),
      "40-ib",
      "40-ib/profile.yaml"
    );

    expect(definition.name).toBe("40-ib");
    expect(definition.version).toBe("1");
    expect(definition.requirements).toEqual({
      fabric: "infiniband",
      features: { multirail: true },
    });
    expect(definition.capabilities).toEqual({ ib: true });
    expect(definition.templates).toEqual([]);
  });

  it("prefers the manifest name over the directory name", () => {
    const definition = parseProfileManifest(
      "name: custom\nprovider: p\n",
      "10-dir",
      "10-dir/profile.yaml"
    );

    expect(definition.name).toBe("custom");
  });

  it("rejects a feature flag that is not a boolean", () => {
    expect(() =>
      parseProfileManifest(
        "provider: p\nprofileRequirements:\n  multirail: maybe\n",
        "x",
        "x/profile.yaml"
      )
    ).toThrow(
      "invalid profile manifest x/profile.yaml: " +
        "profileRequirements.multirail: multirail must be true or false"
    );
  });

  it("requires a provider", () => {
    expect(() => parseProfileManifest("name: x\n", "x", "x/profile.yaml")).toThrow(
      ConfigurationError
    );
  });
});

describe("loadCatalog", () => {
  it("returns entries sorted by directory name and ignores plain files", () => {
    writeEntry("20-general", SRIOV_ETHERNET);
    writeEntry("10-specific", SRIOV_ETHERNET);
    fs.writeFileSync(path.join(catalogDir, "notes.txt"), "not a profile\n");

    const entries = loadCatalog(catalogDir);

    expect(entries.map((entry) => entry.entryName)).toEqual(["10-specific", "20-general"]);
    expect(entries[0].directory).toBe(path.join(path.resolve(catalogDir), "10-specific"));
  });

  it("fails when an entry has no manifest", () => {
    fs.mkdirSync(path.join(catalogDir, "empty"));

    expect(() => loadCatalog(catalogDir)).toThrow(/^failed to read profile manifest /);
  });

  it("fails when the catalog root is missing", () => {
    const missing = path.join(catalogDir, "absent");

    expect(() => loadCatalog(missing)).toThrow(`failed to read profiles directory ${missing}: `);
  });
});

describe("findApplicableProfile", () => {
  const requirements = { fabric: "ethernet", deployment: "sriov", features: {} };

  it("resolves the single SR-IOV Ethernet profile", () => {
    writeEntry("sriov-ethernet", [...SRIOV_ETHERNET, "  rdma: true"]);

    const profile = findApplicableProfile(
      requirements,
      { nodes: { sriov: true, rdma: true } },
      "network-operator",
      { profilesDir: catalogDir }
    );

    expect(profile.name).toBe("sriov-ethernet");
  });

  it("fails when the profile requires rdma to be absent", () => {
    writeEntry("sriov-ethernet", [...SRIOV_ETHERNET, "  rdma: false"]);

    expect(() =>
      findApplicableProfile(
        requirements,
        { nodes: { sriov: true, rdma: true } },
        "network-operator",
        { profilesDir: catalogDir }
      )
    ).toThrow(NoApplicableProfileError);
  });

  it("picks up manifest edits on the next call", () => {
    writeEntry("a", [...SRIOV_ETHERNET, "  rdma: false"]);
    const capabilities = { nodes: { sriov: true, rdma: true } };
    const options = { profilesDir: catalogDir };

    expect(() =>
      findApplicableProfile(requirements, capabilities, "network-operator", options)
    ).toThrow(NoApplicableProfileError);

    writeEntry("a", [...SRIOV_ETHERNET, "  rdma: true"]);

    expect(
      findApplicableProfile(requirements, capabilities, "network-operator", options).name
    ).toBe("a");
  });

  describe("shipped catalog", () => {
    const options = { profilesDir: SHIPPED_PROFILES };

    it("chooses RoCE SR-IOV for an RDMA-capable Ethernet cluster", () => {
      const profile = findApplicableProfile(
        requirements,
        { nodes: { sriov: true, rdma: true } },
        "network-operator",
        options
      );

      expect(profile.name).toBe("ethernet-sriov-rdma");
      expect(profile.templates.map((template) => path.basename(template))).toEqual([
        "nic-cluster-policy.yaml",
        "sriov-network-node-policy.yaml",
        "sriov-network.yaml",
        "ip-pool.yaml",
      ]);
    });

    it("puts the Spectrum-X profile ahead of the general ones", () => {
      const profile = findApplicableProfile(
        { ...requirements, features: { spectrumX: true } },
        { nodes: { sriov: true, rdma: true } },
        "network-operator",
        options
      );

      expect(profile.name).toBe("ethernet-sriov-spectrum-x");
    });

    it("falls back to plain SR-IOV without RDMA", () => {
      const profile = findApplicableProfile(
        requirements,
        { nodes: { sriov: true } },
        "network-operator",
        options
      );

      expect(profile.name).toBe("ethernet-sriov");
    });

    it("has a guide and templates that exist for every entry", () => {
      for (const entry of loadCatalog(SHIPPED_PROFILES)) {
        const files = [...entry.definition.templates, entry.definition.deploymentGuide];
        for (const file of files) {
          expect(fs.existsSync(path.join(entry.directory, file))).toBe(true);
        }
      }
    });
  });
});
