/**
 * files.test.ts - Unit tests for writing generated files
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { writeDeploymentFiles } from "./files";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fabric-launch-files-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("writeDeploymentFiles", () => {
  it("writes every file and returns the paths in order", () => {
    const outputDir = path.join(tmpDir, "network-operator");

    const written = writeDeploymentFiles(
      { "policy.yaml": "kind: Policy\n", "README.md": "# Guide\n" },
      outputDir
    );

    expect(written).toEqual([
      path.join(outputDir, "policy.yaml"),
      path.join(outputDir, "README.md"),
    ]);
    expect(fs.readFileSync(path.join(outputDir, "policy.yaml"), "utf8")).toBe("kind: Policy\n");
  });

  it("replaces what an earlier run left behind", () => {
    const outputDir = path.join(tmpDir, "network-operator");
    writeDeploymentFiles({ "old.yaml": "old\n" }, outputDir);

    writeDeploymentFiles({ "new.yaml": "new\n" }, outputDir);

    expect(fs.readdirSync(outputDir)).toEqual(["new.yaml"]);
  });

  it("rejects names that would leave the directory", () => {
    const outputDir = path.join(tmpDir, "network-operator");

    expect(() => writeDeploymentFiles({ "../escape.yaml": "x" }, outputDir)).toThrow(
      'invalid generated file name "../escape.yaml"'
    );
    expect(() => writeDeploymentFiles({ "..": "x" }, outputDir)).toThrow(
      'invalid generated file name ".."'
    );
    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it("reports a directory that cannot be created", () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "a file, not a directory\n");
    const outputDir = path.join(blocker, "network-operator");

    expect(() => writeDeploymentFiles({ "a.yaml": "x" }, outputDir)).toThrow(
      `failed to write deployment files to ${outputDir}: `
    );
  });
});
