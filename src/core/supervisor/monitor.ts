import type { MonitorOutcome } from "../types.js";
import type { Sleep } from "./delay.js";

export interface Monitored {
  isAlive(): boolean;
}

interface MonitorLoopOptions {
  intervalMs: number;
  signal: AbortSignal;
  sleep: Sleep;
  onTick?: (() => void | Promise<void>) | undefined;
}

export async function monitorLoop(target: Monitored, options: MonitorLoopOptions): Promise<MonitorOutcome> {
  for (;;) {
    if (options.signal.aborted) return "interrupted";
    if (!target.isAlive()) return "child-exited";
    await options.onTick?.();
    await options.sleep(options.intervalMs, options.signal);
  }
}
