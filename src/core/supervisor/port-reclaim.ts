import type { PlatformCapabilities } from "../platform/index.js";
import type { Sleep } from "./delay.js";

export interface ReclaimResult {
  busy: boolean;
  lookupAvailable: boolean;
  signalled: number[];
}

interface ReclaimPortOptions {
  platform: Pick<PlatformCapabilities, "findPortListeners" | "signalProcess">;
  delayMs: number;
  sleep: Sleep;
  onBusy?: ((port: number, pids: number[]) => void) | undefined;
}

/**
 * Best effort: terminates whatever listens on `port` and waits for it to let
 * go. Success is not verified; a port that stays bound shows up later as a
 * failed liveness probe.
 */
export async function reclaimPort(port: number, options: ReclaimPortOptions): Promise<ReclaimResult> {
  const lookup = await options.platform.findPortListeners(port);
  const holders = lookup.pids.filter((pid) => pid !== process.pid);
  if (holders.length === 0) {
    return { busy: false, lookupAvailable: lookup.available, signalled: [] };
  }

  options.onBusy?.(port, holders);
  const signalled = holders.filter((pid) => options.platform.signalProcess(pid, "SIGTERM"));
  await options.sleep(options.delayMs);
  return { busy: true, lookupAvailable: lookup.available, signalled };
}
