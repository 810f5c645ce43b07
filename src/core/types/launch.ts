import type { LaunchPreset } from "./preset.js";

export interface StartCommandOptions {
  port?: string | undefined;
  projectsDir?: string | undefined;
  config?: string | undefined;
  browser?: boolean | undefined;
}

export interface ProjectsCommandOptions {
  projectsDir?: string | undefined;
  config?: string | undefined;
}

export interface LaunchSettings extends LaunchPreset {
  cwd: string;
  projectsDir: string;
  openBrowser: boolean;
  url: string;
}
