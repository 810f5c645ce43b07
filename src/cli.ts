import { homedir } from "node:os";

import { log } from "@clack/prompts";
import { Command } from "commander";

import { runPresets } from "./commands/presets.js";
import { runProjects } from "./commands/projects.js";
import { runStart } from "./commands/start.js";
import { formatErrorLine, normalizeError } from "./core/errors.js";
import { PRESET_NAMES } from "./core/presets.js";
import type { ProjectsCommandOptions, StartCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  teal: "\u001B[38;5;37m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  const head = Math.max(1, Math.floor((maxWidth - 1) * 0.7));
  const tail = Math.max(0, maxWidth - 1 - head);
  return `${text.slice(0, head)}…${text.slice(text.length - tail)}`;
}

function renderBrandHeader(presetArg: string | undefined): void {
  const terminalWidth = process.stdout.columns ?? 80;
  const innerWidth = Math.min(72, Math.max(36, terminalWidth - 4));

  const rows: Array<{ plain: string; styled: (fitted: string) => string }> = [
    { plain: "dashboard-launcher", styled: (fitted) => paint(fitted, ANSI.bold, ANSI.teal) },
    { plain: "Local writing dashboard supervisor", styled: (fitted) => paint(fitted, ANSI.white) },
    { plain: "", styled: (fitted) => fitted },
    { plain: `version:   v${CLI_VERSION}`, styled: (fitted) => paint(fitted, ANSI.mutedGray) },
    { plain: `preset:    ${presetArg ?? "default"}`, styled: (fitted) => paint(fitted, ANSI.mutedGray) },
    { plain: `directory: ${compactPath(process.cwd())}`, styled: (fitted) => paint(fitted, ANSI.mutedGray) }
  ];

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray));
  for (const row of rows) {
    const fitted = ellipsize(row.plain, innerWidth);
    const padding = " ".repeat(Math.max(0, innerWidth - fitted.length));
    console.log(`${vertical} ${row.styled(fitted)}${padding} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray));
  console.log("");
}

program
  .name("dashboard-launcher")
  .description("Start a local writing dashboard server, open it in the browser and keep it supervised until Ctrl+C.")
  .version(CLI_VERSION);

program
  .command("start", { isDefault: true })
  .description("Launch a dashboard preset (defaults to the static dashboard).")
  .argument("[preset]", PRESET_NAMES.join(" | "))
  .option("--port <port>", "Port the dashboard server binds")
  .option("--projects-dir <path>", "Projects directory used for listings and status counts")
  .option("--config <path>", "Path to a dashboard-launcher config file")
  .option("--no-browser", "Do not open the dashboard in a browser")
  .action(async (presetArg: string | undefined, rawOptions: StartCommandOptions) => {
    renderBrandHeader(presetArg);
    await runStart(presetArg, rawOptions);
  });

program
  .command("projects")
  .description("List the projects in the projects directory.")
  .option("--projects-dir <path>", "Projects directory to list")
  .option("--config <path>", "Path to a dashboard-launcher config file")
  .action(async (rawOptions: ProjectsCommandOptions) => {
    await runProjects(rawOptions);
  });

program
  .command("presets")
  .description("Show the available launch presets.")
  .action(() => {
    runPresets();
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    log.error(formatErrorLine(normalized));
    process.exitCode = normalized.exitCode;
  }
}

void main();
