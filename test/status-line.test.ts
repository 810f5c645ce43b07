import { describe, expect, it } from "vitest";

import { sleep } from "../src/core/supervisor/delay.js";
import { formatClock, formatStatusLine } from "../src/core/supervisor/status.js";

describe("status line", () => {
  it("formats local time as HH:MM:SS", () => {
    expect(formatClock(new Date(2026, 0, 2, 9, 5, 7))).toBe("09:05:07");
    expect(formatClock(new Date(2026, 0, 2, 23, 59, 0))).toBe("23:59:00");
  });

  it("renders the dashboard liveness line", () => {
    const line = formatStatusLine({
      at: new Date(2026, 0, 2, 14, 30, 1),
      projectCount: 3,
      processLabel: "API",
      pid: 4242
    });
    expect(line).toBe("14:30:01 - Dashboard active | Projects: 3 | API PID: 4242");
  });

  it("marks an unknown pid", () => {
    const line = formatStatusLine({
      at: new Date(2026, 0, 2, 8, 0, 0),
      projectCount: 0,
      processLabel: "Server",
      pid: undefined
    });
    expect(line).toBe("08:00:00 - Dashboard active | Projects: 0 | Server PID: unknown");
  });
});

describe("sleep", () => {
  it("resolves early when aborted", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });

  it("waits the requested time otherwise", async () => {
    const startedAt = Date.now();
    await sleep(100);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(90);
  });
});
