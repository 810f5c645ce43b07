import { afterEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  runCommand: vi.fn()
}));

vi.mock("../src/core/process-runner.js", async (importOriginal) => {
  const original = await importOriginal<typeof import("../src/core/process-runner.js")>();
  return {
    ...original,
    runCommand: mocks.runCommand
  };
});

import { findPortListeners } from "../src/core/platform/ports.js";

describe("findPortListeners", () => {
  afterEach(() => {
    mocks.runCommand.mockReset();
  });

  it("asks lsof for TCP listeners on the port", async () => {
    mocks.runCommand.mockResolvedValue({ ok: true, stdout: "4242\n4243\n", stderr: "", exitCode: 0 });

    await expect(findPortListeners(8080)).resolves.toEqual({ available: true, pids: [4242, 4243] });
    expect(mocks.runCommand).toHaveBeenCalledWith("lsof", ["-nP", "-iTCP:8080", "-sTCP:LISTEN", "-t"], {
      timeoutMs: 10_000
    });
  });

  it("reads exit status 1 as a free port", async () => {
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "", exitCode: 1, reason: "exit code 1" });

    await expect(findPortListeners(8080)).resolves.toEqual({ available: true, pids: [] });
  });

  it("keeps the listeners when the output was truncated", async () => {
    mocks.runCommand.mockResolvedValue({
      ok: false,
      stdout: "5150\n",
      stderr: "",
      exitCode: 1,
      reason: "exit code 1; output truncated to last 1048576 bytes per stream"
    });

    await expect(findPortListeners(8080)).resolves.toEqual({ available: true, pids: [5150] });
  });

  it("reports the lookup as unavailable when lsof is missing", async () => {
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "", reason: "spawn lsof ENOENT" });

    await expect(findPortListeners(8080)).resolves.toEqual({ available: false, pids: [] });
  });

  it("reports the lookup as unavailable on other failures", async () => {
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "", reason: "timeout after 10s" });

    await expect(findPortListeners(8080)).resolves.toEqual({ available: false, pids: [] });
  });
});
