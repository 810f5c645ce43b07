import { EventEmitter } from "node:events";

import { describe, expect, it, vi } from "vitest";

import { createProcessInterruptSource } from "../src/core/supervisor/interrupts.js";

describe("createProcessInterruptSource", () => {
  it("calls the handler once however many signals arrive", () => {
    const target = new EventEmitter();
    const handler = vi.fn();

    const stop = createProcessInterruptSource(target).listen(handler);
    target.emit("SIGINT", "SIGINT");
    target.emit("SIGTERM", "SIGTERM");
    target.emit("SIGINT", "SIGINT");
    stop();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith("SIGINT");
  });

  it("answers SIGTERM as well as SIGINT", () => {
    const target = new EventEmitter();
    const handler = vi.fn();

    const stop = createProcessInterruptSource(target).listen(handler);
    target.emit("SIGTERM", "SIGTERM");
    stop();

    expect(handler).toHaveBeenCalledWith("SIGTERM");
  });

  it("detaches from both signals", () => {
    const target = new EventEmitter();
    const handler = vi.fn();

    const stop = createProcessInterruptSource(target).listen(handler);
    expect(target.listenerCount("SIGINT")).toBe(1);
    expect(target.listenerCount("SIGTERM")).toBe(1);

    stop();
    target.emit("SIGINT", "SIGINT");

    expect(target.listenerCount("SIGINT")).toBe(0);
    expect(target.listenerCount("SIGTERM")).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it("registers on the process by default", () => {
    const sigintBefore = process.listenerCount("SIGINT");
    const sigtermBefore = process.listenerCount("SIGTERM");

    const stop = createProcessInterruptSource().listen(() => undefined);
    expect(process.listenerCount("SIGINT")).toBe(sigintBefore + 1);
    expect(process.listenerCount("SIGTERM")).toBe(sigtermBefore + 1);

    stop();
    expect(process.listenerCount("SIGINT")).toBe(sigintBefore);
    expect(process.listenerCount("SIGTERM")).toBe(sigtermBefore);
  });
});
