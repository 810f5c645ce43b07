import { UserInputError } from "./errors.js";
import { DEFAULT_INTERPRETERS } from "./supervisor/interpreter.js";
import type { ChildCommandTemplate, LaunchPreset, PreflightCheck, PresetName } from "./types.js";

export const PRESET_NAMES = ["dashboard", "integrated", "modern"] as const satisfies readonly PresetName[];
export const DEFAULT_PRESET: PresetName = "dashboard";

const STATIC_SERVER: ChildCommandTemplate = {
  executable: "{interpreter}",
  args: ["-m", "http.server", "{port}"]
};

const BACKEND_MODULES = [
  { module: "start", label: "project creation", name: "Start" },
  { module: "intake", label: "character intake", name: "Intake" },
  { module: "brainstorm", label: "brainstorming engine", name: "Brainstorm" },
  { module: "write", label: "writing engine", name: "Write" }
] as const;

function moduleChecks(severity: PreflightCheck["severity"], failureSuffix: string): PreflightCheck[] {
  return BACKEND_MODULES.map((entry) => ({
    label: `Testing ${entry.label}...`,
    statement: `import ${entry.module}`,
    readyMessage: `${entry.name} module: Ready`,
    failureMessage: `${entry.name} module: Issues detected${failureSuffix}`,
    severity
  }));
}

const PRESETS: Record<PresetName, LaunchPreset> = {
  dashboard: {
    name: "dashboard",
    title: "Writing Dashboard",
    port: 8080,
    urlPath: "/lizzy_alpha_dashboard.html",
    command: STATIC_SERVER,
    interpreters: DEFAULT_INTERPRETERS,
    graceDelayMs: 2_000,
    reclaimDelayMs: 2_000,
    monitorIntervalMs: 5_000,
    processLabel: "Server",
    reportProjects: false,
    features: [],
    endpoints: [],
    preflight: []
  },
  integrated: {
    name: "integrated",
    title: "Writing Dashboard (integrated system)",
    port: 8080,
    urlPath: "/simple_dashboard.html",
    command: STATIC_SERVER,
    interpreters: DEFAULT_INTERPRETERS,
    graceDelayMs: 2_000,
    reclaimDelayMs: 2_000,
    monitorIntervalMs: 10_000,
    processLabel: "Server",
    reportProjects: true,
    features: [
      "Project creation and management",
      "Character development",
      "Brainstorming backed by the project knowledge base",
      "Scene writing with tone presets",
      "Progress tracking and version control"
    ],
    endpoints: [],
    preflight: [
      ...moduleChecks("error", ""),
      {
        label: "Testing retrieval integration...",
        statement: "from lightrag_helper import LightRAGManager",
        readyMessage: "Retrieval: Ready for brainstorming",
        failureMessage: "Retrieval: Check API key configuration",
        severity: "warn"
      }
    ]
  },
  modern: {
    name: "modern",
    title: "Writing Dashboard (API backend)",
    port: 5003,
    urlPath: "/",
    command: { executable: "{interpreter}", args: ["modern_api.py"] },
    interpreters: DEFAULT_INTERPRETERS,
    graceDelayMs: 3_000,
    reclaimDelayMs: 2_000,
    monitorIntervalMs: 10_000,
    processLabel: "API",
    reportProjects: true,
    features: [
      "Responsive web interface with dark/light modes",
      "Project creation and management",
      "Character development",
      "Scene writing and generation",
      "Real-time data synchronization"
    ],
    endpoints: ["/api/", "/api/status"],
    preflight: [
      ...moduleChecks("warn", " (will use simulation mode)"),
      {
        label: "Testing Flask and dependencies...",
        statement: "import flask, flask_cors",
        readyMessage: "Flask: Ready",
        failureMessage: "Flask dependencies missing. Installing...",
        severity: "error",
        remedy: ["-m", "pip", "install", "flask", "flask-cors"]
      }
    ]
  }
};

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((preset) => preset === value);
}

export function getPreset(name: string | undefined): LaunchPreset {
  const normalized = name?.trim().toLowerCase() || DEFAULT_PRESET;
  if (!isPresetName(normalized)) {
    throw new UserInputError(`Unknown preset "${name ?? ""}". Expected one of: ${PRESET_NAMES.join(", ")}.`);
  }
  return PRESETS[normalized];
}

export function listPresets(): LaunchPreset[] {
  return PRESET_NAMES.map((name) => PRESETS[name]);
}

/** Substitutes `{interpreter}` and `{port}` in the preset's command template. */
export function renderChildCommand(
  template: ChildCommandTemplate,
  values: { interpreter: string; port: number }
): ChildCommandTemplate {
  const render = (part: string): string =>
    part.replaceAll("{interpreter}", values.interpreter).replaceAll("{port}", String(values.port));
  return {
    executable: render(template.executable),
    args: template.args.map(render)
  };
}
