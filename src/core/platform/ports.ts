import { runCommand } from "../process-runner.js";

export interface PortListenerLookup {
  /** False when the lookup tool itself is unavailable. */
  available: boolean;
  pids: number[];
}

const LOOKUP_TIMEOUT_MS = 10_000;

export function parsePidList(output: string): number[] {
  const pids = new Set<number>();
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const pid = Number.parseInt(trimmed, 10);
    if (pid > 0) pids.add(pid);
  }
  return Array.from(pids);
}

export async function findPortListeners(port: number): Promise<PortListenerLookup> {
  const result = await runCommand("lsof", ["-nP", `-iTCP:${port}`, "-sTCP:LISTEN", "-t"], {
    timeoutMs: LOOKUP_TIMEOUT_MS
  });
  // lsof exits 1 with empty output when nothing matches.
  if (result.ok || result.exitCode === 1) {
    return { available: true, pids: parsePidList(result.stdout) };
  }
  return { available: false, pids: [] };
}
