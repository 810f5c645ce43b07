import { log, spinner } from "@clack/prompts";

import { runCommand, summarizeFailure } from "../../core/process-runner.js";
import type { PreflightCheck } from "../../core/types.js";

const CHECK_TIMEOUT_MS = 60 * 1000;
const REMEDY_TIMEOUT_MS = 10 * 60 * 1000;

export interface PreflightResult {
  label: string;
  ok: boolean;
  remedied: boolean;
}

async function applyRemedy(check: PreflightCheck, remedy: string[], interpreter: string, cwd: string): Promise<boolean> {
  const remedySpinner = spinner();
  remedySpinner.start(`Running ${interpreter} ${remedy.join(" ")}...`);
  const result = await runCommand(interpreter, remedy, { cwd, timeoutMs: REMEDY_TIMEOUT_MS });
  if (result.ok) {
    remedySpinner.stop(`${check.label.replace(/\.\.\.$/, "")}: dependencies installed.`);
    return true;
  }
  remedySpinner.stop("Dependency installation failed.");
  log.warn(summarizeFailure(result));
  return false;
}

/** Import checks against the Python backend. Failures are reported, never fatal. */
export async function runPreflight(checks: PreflightCheck[], interpreter: string, cwd: string): Promise<PreflightResult[]> {
  const results: PreflightResult[] = [];

  for (const check of checks) {
    log.step(check.label);
    const result = await runCommand(interpreter, ["-c", check.statement], { cwd, timeoutMs: CHECK_TIMEOUT_MS });
    if (result.ok) {
      log.success(check.readyMessage);
      results.push({ label: check.label, ok: true, remedied: false });
      continue;
    }

    if (check.severity === "error") {
      log.error(check.failureMessage);
    } else {
      log.warn(check.failureMessage);
    }

    const remedied = check.remedy ? await applyRemedy(check, check.remedy, interpreter, cwd) : false;
    results.push({ label: check.label, ok: false, remedied });
  }

  return results;
}
