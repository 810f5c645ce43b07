import { resolve } from "node:path";

import { loadLauncherConfig, parsePortOption, resolveLaunchSettings, resolvePresetName } from "../core/config.js";
import { getPreset } from "../core/presets.js";
import type { LaunchSettings, StartCommandOptions } from "../core/types.js";
import { createLaunchDependencies, launchDashboard } from "./launch.js";
import type { LaunchDependencies, LaunchSummary } from "./launch.js";

export function resolveStartSettings(presetArg: string | undefined, options: StartCommandOptions, cwd: string): LaunchSettings {
  const config = loadLauncherConfig(cwd, options.config);
  const preset = getPreset(resolvePresetName(presetArg, config));
  return resolveLaunchSettings(
    preset,
    config,
    {
      port: parsePortOption(options.port),
      projectsDir: options.projectsDir,
      openBrowser: options.browser
    },
    cwd
  );
}

export async function runStart(
  presetArg: string | undefined,
  options: StartCommandOptions,
  deps: LaunchDependencies = createLaunchDependencies()
): Promise<LaunchSummary> {
  const settings = resolveStartSettings(presetArg, options, resolve(process.cwd()));
  return launchDashboard(settings, deps);
}
