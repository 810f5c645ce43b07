export type { MonitorOutcome, PresetName, ProcessLabel, SessionState } from "./types/common.js";
export type { ChildCommandTemplate, LaunchPreset, PreflightCheck, PreflightSeverity } from "./types/preset.js";
export type { LaunchSettings, ProjectsCommandOptions, StartCommandOptions } from "./types/launch.js";
export type { ProjectDirectoryListing, ProjectEntry } from "./types/project.js";
