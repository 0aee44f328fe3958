/**
 * matching.test.ts - Unit tests for predicate evaluation and first-match selection
 *
 * Catalog entries are built in memory; catalog.test.ts covers reading them
 * from disk.
 */

import { describe, it, expect, vi } from "vitest";
import * as path from "path";
import { NoApplicableProfileError } from "../errors";
import type { CapabilitiesDescriptor, RequirementsDescriptor } from "../config/types";
import { findMismatch, matchesProfile, resolveEntry, selectProfile } from "./matching";
import type { CatalogEntry, ProfileDefinition } from "./types";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

function makeDefinition(overrides: Partial<ProfileDefinition> = {}): ProfileDefinition {
  return {
    name: "profile",
    description: "",
    version: "1",
    provider: "network-operator",
    requirements: { features: {} },
    capabilities: {},
    deploymentGuide: "",
    templates: [],
    ...overrides,
  };
}

function makeEntry(entryName: string, overrides: Partial<ProfileDefinition> = {}): CatalogEntry {
  return {
    entryName,
    directory: path.resolve("/catalog", entryName),
    definition: makeDefinition({ name: entryName, ...overrides }),
  };
}

function makeRequirements(
  overrides: Partial<RequirementsDescriptor> = {}
): RequirementsDescriptor {
  return { fabric: "ethernet", deployment: "sriov", features: {}, ...overrides };
}

function makeCapabilities(nodes: Record<string, boolean> = {}): CapabilitiesDescriptor {
  return { nodes };
}

const sriovEthernet = makeDefinition({
  requirements: { fabric: "ethernet", deployment: "sriov", features: { multirail: false } },
  capabilities: { sriov: true },
});

// ---------------------------------------------------------------------------
// findMismatch / matchesProfile
// ---------------------------------------------------------------------------

describe("matchesProfile", () => {
  it("matches anything when the profile declares no predicates", () => {
    const wildcard = makeDefinition();
    const inputs: Array<[RequirementsDescriptor, CapabilitiesDescriptor]> = [
      [makeRequirements(), makeCapabilities()],
      [
        makeRequirements({ fabric: "infiniband", deployment: "hostdev", features: { ai: true } }),
        makeCapabilities({ sriov: false, rdma: true }),
      ],
      [makeRequirements({ fabric: "", deployment: "" }), makeCapabilities({ ib: true })],
    ];

    for (const [requirements, capabilities] of inputs) {
      expect(matchesProfile(wildcard, requirements, capabilities)).toBe(true);
    }
  });

  it("matches when every declared predicate holds", () => {
    expect(
      matchesProfile(sriovEthernet, makeRequirements(), makeCapabilities({ sriov: true }))
    ).toBe(true);
  });

  it("stops matching when any single constrained field flips", () => {
    const capabilities = makeCapabilities({ sriov: true });

    expect(
      findMismatch(sriovEthernet, makeRequirements({ fabric: "infiniband" }), capabilities)
    ).toBe("fabric: want ethernet, have infiniband");
    expect(
      findMismatch(sriovEthernet, makeRequirements({ deployment: "hostdev" }), capabilities)
    ).toBe("deployment: want sriov, have hostdev");
    expect(
      findMismatch(
        sriovEthernet,
        makeRequirements({ features: { multirail: true } }),
        capabilities
      )
    ).toBe("multirail: want false, have true");
    expect(
      findMismatch(sriovEthernet, makeRequirements(), makeCapabilities({ sriov: false }))
    ).toBe("sriov capability: want true, have false");
  });

  it("reads unset flags and capabilities as false", () => {
    const wantsSpectrumX = makeDefinition({
      requirements: { features: { spectrumX: true } },
    });
    const wantsNoRdma = makeDefinition({ capabilities: { rdma: false } });

    expect(findMismatch(wantsSpectrumX, makeRequirements(), makeCapabilities())).toBe(
      "spectrumX: want true, have false"
    );
    expect(matchesProfile(wantsNoRdma, makeRequirements(), makeCapabilities())).toBe(true);
  });

  it("reports an unset fabric as (unset)", () => {
    expect(
      findMismatch(sriovEthernet, makeRequirements({ fabric: "" }), makeCapabilities())
    ).toBe("fabric: want ethernet, have (unset)");
  });
});

// ---------------------------------------------------------------------------
// selectProfile
// ---------------------------------------------------------------------------

describe("selectProfile", () => {
  const requirements = makeRequirements();
  const capabilities = makeCapabilities({ sriov: true, rdma: true });

  it("returns the first matching entry in the order given", () => {
    const entries = [
      makeEntry("a-specific", { requirements: { fabric: "infiniband", features: {} } }),
      makeEntry("b-general", { requirements: { fabric: "ethernet", features: {} } }),
      makeEntry("c-wildcard"),
    ];

    const profile = selectProfile(entries, requirements, capabilities, "network-operator");

    expect(profile.name).toBe("b-general");
  });

  it("gives the same answer on every call", () => {
    const entries = [makeEntry("a"), makeEntry("b")];

    const picks = [1, 2, 3].map(
      () => selectProfile(entries, requirements, capabilities, "network-operator").name
    );

    expect(picks).toEqual(["a", "a", "a"]);
  });

  it("only considers entries owned by the provider", () => {
    const entries = [makeEntry("a", { provider: "other" }), makeEntry("b")];

    expect(selectProfile(entries, requirements, capabilities, "network-operator").name).toBe(
      "b"
    );
  });

  it("reports each skipped entry with its reason", () => {
    const onSkip = vi.fn();
    const entries = [
      makeEntry("a", { capabilities: { ib: true } }),
      makeEntry("b"),
    ];

    selectProfile(entries, requirements, capabilities, "network-operator", onSkip);

    expect(onSkip).toHaveBeenCalledOnce();
    expect(onSkip).toHaveBeenCalledWith("a", "ib capability: want true, have false");
  });

  it("throws NoApplicableProfileError carrying the inputs", () => {
    const entries = [makeEntry("a", { capabilities: { rdma: false } })];

    let caught: unknown;
    try {
      selectProfile(entries, requirements, capabilities, "network-operator");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NoApplicableProfileError);
    if (caught instanceof NoApplicableProfileError) {
      expect(caught.providerName).toBe("network-operator");
      expect(caught.requirements).toEqual(requirements);
      expect(caught.capabilities).toEqual(capabilities);
    }
  });

  it("does not modify its inputs", () => {
    const frozenRequirements = Object.freeze(makeRequirements());
    const entries = [makeEntry("a", { templates: ["x.yaml"] })];

    const profile = selectProfile(entries, frozenRequirements, capabilities, "network-operator");

    expect(profile.templates).toEqual([path.resolve("/catalog/a", "x.yaml")]);
    expect(entries[0].definition.templates).toEqual(["x.yaml"]);
  });
});

describe("resolveEntry", () => {
  it("makes template and guide paths absolute", () => {
    const resolved = resolveEntry(
      makeEntry("sriov", { templates: ["policy.yaml"], deploymentGuide: "README.md" })
    );

    expect(resolved.directory).toBe(path.resolve("/catalog", "sriov"));
    expect(resolved.templates).toEqual([path.resolve("/catalog/sriov", "policy.yaml")]);
    expect(resolved.deploymentGuide).toBe(path.resolve("/catalog/sriov", "README.md"));
  });

  it("leaves an absent guide empty", () => {
    expect(resolveEntry(makeEntry("x")).deploymentGuide).toBe("");
  });
});
