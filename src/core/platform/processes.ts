import { spawn } from "node:child_process";

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object" || !("code" in error)) return undefined;
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

/** Signal-zero check: true while the PID denotes a process we may signal. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else.
    return errorCode(error) === "EPERM";
  }
}

/** False when the process is gone or owned by another user. */
export function signalProcess(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ESRCH" || code === "EPERM") return false;
    throw error;
  }
}

/** Starts a fire-and-forget process; resolves false when the OS refuses to spawn it. */
export function launchDetached(command: string, args: string[]): Promise<boolean> {
  return new Promise((resolveLaunch) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: "ignore"
    });
    child.once("error", () => resolveLaunch(false));
    child.once("spawn", () => {
      child.unref();
      resolveLaunch(true);
    });
  });
}
