import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";

import { ExecutionError, StartupFailedError } from "../errors.js";
import type { PlatformCapabilities } from "../platform/index.js";
import type { ChildCommandTemplate, SessionState } from "../types.js";
import { sleep as defaultSleep } from "./delay.js";
import type { Sleep } from "./delay.js";

const DEFAULT_KILL_TIMEOUT_MS = 3_000;

const ALLOWED_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Idle: ["Starting"],
  Starting: ["Running", "Stopping", "Stopped"],
  Running: ["Stopping"],
  Stopping: ["Stopped"],
  Stopped: []
};

export interface ServerSessionOptions {
  port: number;
  command: ChildCommandTemplate;
  platform: Pick<PlatformCapabilities, "isProcessAlive" | "signalProcess">;
  cwd?: string | undefined;
  killTimeoutMs?: number | undefined;
  sleep?: Sleep | undefined;
  onStateChange?: ((state: SessionState) => void) | undefined;
}

/**
 * One supervised child lifetime. The session owns the child handle; the only
 * way to release it is `shutdown()`.
 */
export class ServerSession {
  readonly port: number;
  readonly command: ChildCommandTemplate;

  private stateValue: SessionState = "Idle";
  private child: ChildProcess | null = null;
  private exitObserved = false;
  private spawnError: Error | null = null;
  private exited: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;
  private readonly options: ServerSessionOptions;

  constructor(options: ServerSessionOptions) {
    this.port = options.port;
    this.command = options.command;
    this.options = options;
  }

  get state(): SessionState {
    return this.stateValue;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  start(): number | undefined {
    this.transition("Starting");
    const child = spawn(this.command.executable, this.command.args, {
      cwd: this.options.cwd,
      detached: true,
      stdio: "ignore"
    });
    this.child = child;
    this.exited = new Promise((resolveExit) => {
      child.once("exit", () => {
        this.exitObserved = true;
        resolveExit();
      });
      child.on("error", (error) => {
        if (child.pid !== undefined) return;
        this.spawnError = error;
        this.exitObserved = true;
        resolveExit();
      });
    });
    return child.pid;
  }

  isAlive(): boolean {
    const pid = this.child?.pid;
    if (pid === undefined || this.exitObserved) return false;
    return this.options.platform.isProcessAlive(pid);
  }

  /** Liveness probe; call once the grace delay has elapsed. */
  confirmRunning(details: Record<string, unknown> = {}): void {
    if (this.stateValue !== "Starting") {
      throw new ExecutionError(`Cannot confirm a session in state ${this.stateValue}.`);
    }
    if (this.isAlive()) {
      this.transition("Running");
      return;
    }

    this.transition("Stopped");
    const reason = this.spawnError ? `: ${this.spawnError.message}` : "";
    throw new StartupFailedError(`Failed to start server on port ${this.port}${reason}`, {
      details: {
        port: this.port,
        command: [this.command.executable, ...this.command.args].join(" "),
        exitCode: this.child?.exitCode ?? null,
        ...details
      },
      ...(this.spawnError ? { cause: this.spawnError } : {})
    });
  }

  shutdown(): Promise<void> {
    if (this.stateValue === "Stopped" || this.stateValue === "Idle") return Promise.resolve();
    if (this.stopping) return this.stopping;

    this.transition("Stopping");
    this.stopping = this.terminateChild().finally(() => {
      this.transition("Stopped");
    });
    return this.stopping;
  }

  private async terminateChild(): Promise<void> {
    const pid = this.child?.pid;
    if (pid === undefined || this.exitObserved) return;

    const wait = this.options.sleep ?? defaultSleep;
    const timeoutMs = this.options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;

    if (!this.options.platform.signalProcess(pid, "SIGTERM")) return;
    const stillRunning = await this.waitForExit(wait, timeoutMs);
    if (!stillRunning) return;

    if (!this.options.platform.signalProcess(pid, "SIGKILL")) return;
    await this.waitForExit(wait, timeoutMs);
  }

  /** Resolves true when the child is still running after `timeoutMs`. */
  private async waitForExit(wait: Sleep, timeoutMs: number): Promise<boolean> {
    const controller = new AbortController();
    await Promise.race([this.exited, wait(timeoutMs, controller.signal)]);
    controller.abort();
    return !this.exitObserved;
  }

  private transition(next: SessionState): void {
    const allowed = ALLOWED_TRANSITIONS[this.stateValue];
    if (!allowed.includes(next)) {
      throw new ExecutionError(`Invalid session transition ${this.stateValue} -> ${next}.`);
    }
    this.stateValue = next;
    this.options.onStateChange?.(next);
  }
}
