import type { ProcessLabel } from "../types.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export interface StatusLineInput {
  at: Date;
  projectCount: number;
  processLabel: ProcessLabel;
  pid: number | undefined;
}

export function formatStatusLine(input: StatusLineInput): string {
  const pid = input.pid === undefined ? "unknown" : String(input.pid);
  return `${formatClock(input.at)} - Dashboard active | Projects: ${input.projectCount} | ${input.processLabel} PID: ${pid}`;
}
