import type { PresetName, ProcessLabel } from "./common.js";

export interface ChildCommandTemplate {
  executable: string;
  args: string[];
}

export type PreflightSeverity = "warn" | "error";

export interface PreflightCheck {
  label: string;
  statement: string;
  readyMessage: string;
  failureMessage: string;
  severity: PreflightSeverity;
  remedy?: string[];
}

export interface LaunchPreset {
  name: PresetName;
  title: string;
  port: number;
  urlPath: string;
  command: ChildCommandTemplate;
  interpreters: string[];
  graceDelayMs: number;
  reclaimDelayMs: number;
  monitorIntervalMs: number;
  processLabel: ProcessLabel;
  reportProjects: boolean;
  features: string[];
  endpoints: string[];
  preflight: PreflightCheck[];
}
