/**
 * index.test.ts - Unit tests for the clack-backed prompts
 *
 * @clack/prompts is mocked; the cancel symbol stands in for Ctrl+C.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { clackMock } = vi.hoisted(() => {
  const cancel = Symbol("cancel");
  return {
    clackMock: {
      cancel,
      text: vi.fn(),
      confirm: vi.fn(),
      isCancel: vi.fn((value: unknown) => value === cancel),
    },
  };
});

vi.mock("@clack/prompts", () => ({
  text: clackMock.text,
  confirm: clackMock.confirm,
  isCancel: clackMock.isCancel,
}));

import { createTerminalOutput } from "./index";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("createTerminalOutput().ask", () => {
  it("returns an empty string when Enter is pressed on an empty line", async () => {
    clackMock.text.mockResolvedValue(undefined);

    await expect(createTerminalOutput().ask("You")).resolves.toBe("");
    expect(clackMock.text).toHaveBeenCalledWith({
      message: "You",
      placeholder: "type a message",
      defaultValue: "",
    });
  });

  it("trims the answer", async () => {
    clackMock.text.mockResolvedValue("  which profile?  ");

    await expect(createTerminalOutput().ask("You")).resolves.toBe("which profile?");
  });

  it("returns null when cancelled", async () => {
    clackMock.text.mockResolvedValue(clackMock.cancel);

    await expect(createTerminalOutput().ask("You")).resolves.toBeNull();
  });
});

describe("createTerminalOutput().confirm", () => {
  it("passes the answer through", async () => {
    clackMock.confirm.mockResolvedValue(true);

    await expect(createTerminalOutput().confirm("Generate anyway?")).resolves.toBe(true);
    expect(clackMock.confirm).toHaveBeenCalledWith({
      message: "Generate anyway?",
      initialValue: false,
    });
  });

  it("treats cancelling as no", async () => {
    clackMock.confirm.mockResolvedValue(clackMock.cancel);

    await expect(createTerminalOutput().confirm("Generate anyway?")).resolves.toBe(false);
  });
});
