import { spawnSync } from "node:child_process";

export function hasBinary(command: string): boolean {
  const locator = process.platform === "win32" ? "where" : "which";
  const probe = spawnSync(locator, [command], { encoding: "utf8" });
  return probe.status === 0;
}
