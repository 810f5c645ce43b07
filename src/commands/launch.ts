import { log } from "@clack/prompts";

import { ChildExitedError } from "../core/errors.js";
import { createNodePlatform } from "../core/platform/index.js";
import type { PlatformCapabilities } from "../core/platform/index.js";
import { renderChildCommand } from "../core/presets.js";
import { countArtifacts, ensureProjectsDirectory } from "../core/projects.js";
import { openBrowser } from "../core/supervisor/browser.js";
import { sleep } from "../core/supervisor/delay.js";
import type { Sleep } from "../core/supervisor/delay.js";
import { resolveInterpreter } from "../core/supervisor/interpreter.js";
import { createProcessInterruptSource } from "../core/supervisor/interrupts.js";
import type { InterruptSource } from "../core/supervisor/interrupts.js";
import { monitorLoop } from "../core/supervisor/monitor.js";
import { reclaimPort } from "../core/supervisor/port-reclaim.js";
import type { ReclaimResult } from "../core/supervisor/port-reclaim.js";
import { ServerSession } from "../core/supervisor/session.js";
import { formatStatusLine } from "../core/supervisor/status.js";
import type { LaunchSettings, MonitorOutcome } from "../core/types.js";
import { runPreflight } from "./launch/preflight.js";
import { reportProjects } from "./launch/project-report.js";

export interface LaunchDependencies {
  platform: PlatformCapabilities;
  interrupts: InterruptSource;
  sleep: Sleep;
  now: () => Date;
}

export interface LaunchSummary {
  outcome: MonitorOutcome;
  pid: number | undefined;
  interpreter: string;
  reclaim: ReclaimResult;
}

export function createLaunchDependencies(): LaunchDependencies {
  return {
    platform: createNodePlatform(),
    interrupts: createProcessInterruptSource(),
    sleep,
    now: () => new Date()
  };
}

function serverNoun(settings: LaunchSettings): string {
  return settings.processLabel === "API" ? "API server" : "Web server";
}

function announcePreset(settings: LaunchSettings): void {
  if (settings.features.length === 0) return;
  log.message(["Features:", ...settings.features.map((feature) => `  - ${feature}`)].join("\n"));
}

function announceRunning(settings: LaunchSettings, pid: number | undefined): void {
  const origin = `http://localhost:${settings.port}`;
  const lines = [`Dashboard: ${settings.url}`, ...settings.endpoints.map((endpoint) => `Endpoint: ${origin}${endpoint}`)];
  log.message(lines.join("\n"));
  log.info(`To stop: press Ctrl+C or run: kill ${pid ?? "<pid>"}`);
  log.step(`${settings.title} is running. Press Ctrl+C to stop.`);
}

async function openDashboard(settings: LaunchSettings, platform: PlatformCapabilities): Promise<void> {
  if (!settings.openBrowser) {
    log.info(`Dashboard available at ${settings.url}`);
    return;
  }
  log.step(`Opening dashboard at ${settings.url}`);
  const opener = await openBrowser(settings.url, platform);
  if (!opener) {
    log.info(`Please open ${settings.url} in your browser`);
  }
}

async function supervise(
  session: ServerSession,
  settings: LaunchSettings,
  deps: LaunchDependencies,
  signal: AbortSignal,
  reclaim: ReclaimResult
): Promise<MonitorOutcome> {
  log.step(`Starting ${serverNoun(settings).toLowerCase()} on http://localhost:${settings.port}`);
  session.start();
  await deps.sleep(settings.graceDelayMs, signal);
  if (signal.aborted) return "interrupted";

  session.confirmRunning({ portWasBusy: reclaim.busy });
  log.success(`${serverNoun(settings)} started (PID: ${session.pid ?? "unknown"})`);

  await openDashboard(settings, deps.platform);
  announceRunning(settings, session.pid);

  const onTick = async (): Promise<void> => {
    const projectCount = await countArtifacts(settings.projectsDir);
    log.message(
      formatStatusLine({
        at: deps.now(),
        projectCount,
        processLabel: settings.processLabel,
        pid: session.pid
      })
    );
  };

  return monitorLoop(session, {
    intervalMs: settings.monitorIntervalMs,
    signal,
    sleep: deps.sleep,
    onTick
  });
}

/**
 * Runs one supervised dashboard server from interpreter lookup to shutdown.
 * Resolves after a clean interrupt; rejects on every other ending.
 */
export async function launchDashboard(
  settings: LaunchSettings,
  deps: LaunchDependencies = createLaunchDependencies()
): Promise<LaunchSummary> {
  const interpreter = resolveInterpreter(settings.interpreters, deps.platform);

  const reclaim = await reclaimPort(settings.port, {
    platform: deps.platform,
    delayMs: settings.reclaimDelayMs,
    sleep: deps.sleep,
    onBusy(port, pids) {
      log.warn(`Port ${port} is already in use (PID ${pids.join(", ")}). Trying to stop the existing process...`);
    }
  });

  announcePreset(settings);
  if (settings.preflight.length > 0) {
    await runPreflight(settings.preflight, interpreter, settings.cwd);
  }
  if (settings.reportProjects) {
    await reportProjects(settings.projectsDir);
  } else {
    await ensureProjectsDirectory(settings.projectsDir);
  }

  const session = new ServerSession({
    port: settings.port,
    command: renderChildCommand(settings.command, { interpreter, port: settings.port }),
    platform: deps.platform,
    cwd: settings.cwd,
    sleep: deps.sleep
  });
  const controller = new AbortController();
  const stopListening = deps.interrupts.listen(() => {
    log.step(`Stopping ${settings.title}...`);
    controller.abort();
  });

  let outcome: MonitorOutcome;
  try {
    outcome = await supervise(session, settings, deps, controller.signal, reclaim);
  } finally {
    stopListening();
    await session.shutdown();
  }

  if (outcome === "child-exited") {
    log.error(`${settings.processLabel === "API" ? "API server" : "Server"} process ended unexpectedly`);
    throw new ChildExitedError(`${serverNoun(settings)} on port ${settings.port} exited on its own.`, {
      details: { port: settings.port, pid: session.pid ?? null }
    });
  }

  log.success(`Stopped ${settings.title}. Goodbye!`);
  return { outcome, pid: session.pid, interpreter, reclaim };
}
