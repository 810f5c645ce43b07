import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { z } from "zod";

import { ConfigError, UserInputError } from "./errors.js";
import { PRESET_NAMES } from "./presets.js";
import type { LaunchPreset, LaunchSettings, PresetName } from "./types.js";

export const DEFAULT_CONFIG_FILE = "dashboard-launcher.config.json";
export const DEFAULT_PROJECTS_DIR = "projects";

const portSchema = z.number().int().min(1).max(65_535);
const delaySchema = z.number().int().min(0).max(600_000);

const presetOverrideSchema = z
  .object({
    port: portSchema.optional(),
    urlPath: z.string().startsWith("/").optional(),
    interpreters: z.array(z.string().min(1)).min(1).optional(),
    graceDelayMs: delaySchema.optional(),
    reclaimDelayMs: delaySchema.optional(),
    monitorIntervalMs: z.number().int().min(100).max(600_000).optional()
  })
  .strict();

const launcherConfigSchema = z
  .object({
    defaultPreset: z.enum(PRESET_NAMES).optional(),
    projectsDir: z.string().min(1).optional(),
    openBrowser: z.boolean().optional(),
    presets: z
      .object({
        dashboard: presetOverrideSchema.optional(),
        integrated: presetOverrideSchema.optional(),
        modern: presetOverrideSchema.optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type LauncherConfig = z.infer<typeof launcherConfigSchema>;

export interface SettingsOverrides {
  port?: number | undefined;
  projectsDir?: string | undefined;
  openBrowser?: boolean | undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseLauncherConfig(raw: string, source: string): LauncherConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${source} is not valid JSON.`, { cause: error });
  }

  const parsed = launcherConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${source}: ${formatIssues(parsed.error)}`, {
      details: { source }
    });
  }
  return parsed.data;
}

/**
 * Reads the config file named by `--config`, or the default file in `cwd`
 * when present. An explicitly named file must exist.
 */
export function loadLauncherConfig(cwd: string, explicitPath?: string): LauncherConfig {
  const path = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(path)) {
    if (explicitPath !== undefined) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }
  return parseLauncherConfig(readFileSync(path, "utf8"), path);
}

export function parsePortOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  const port = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!portSchema.safeParse(port).success) {
    throw new UserInputError(`Invalid --port value "${value}". Expected an integer between 1 and 65535.`);
  }
  return port;
}

export function resolvePresetName(requested: string | undefined, config: LauncherConfig): string | undefined {
  return requested ?? config.defaultPreset;
}

function presetOverrides(config: LauncherConfig, name: PresetName): z.infer<typeof presetOverrideSchema> {
  return config.presets?.[name] ?? {};
}

/** Layers the config file, then CLI flags, over the preset defaults. */
export function resolveLaunchSettings(
  preset: LaunchPreset,
  config: LauncherConfig,
  overrides: SettingsOverrides,
  cwd: string
): LaunchSettings {
  const fromConfig = presetOverrides(config, preset.name);
  const port = overrides.port ?? fromConfig.port ?? preset.port;
  const urlPath = fromConfig.urlPath ?? preset.urlPath;

  return {
    ...preset,
    port,
    urlPath,
    interpreters: fromConfig.interpreters ?? preset.interpreters,
    graceDelayMs: fromConfig.graceDelayMs ?? preset.graceDelayMs,
    reclaimDelayMs: fromConfig.reclaimDelayMs ?? preset.reclaimDelayMs,
    monitorIntervalMs: fromConfig.monitorIntervalMs ?? preset.monitorIntervalMs,
    cwd,
    projectsDir: resolve(cwd, overrides.projectsDir ?? config.projectsDir ?? DEFAULT_PROJECTS_DIR),
    openBrowser: overrides.openBrowser ?? config.openBrowser ?? true,
    url: `http://localhost:${port}${urlPath}`
  };
}
