import { resolve } from "node:path";

import { log } from "@clack/prompts";

import { DEFAULT_PROJECTS_DIR, loadLauncherConfig } from "../core/config.js";
import { countArtifacts, listProjects } from "../core/projects.js";
import type { ProjectsCommandOptions } from "../core/types.js";
import { describeProjects } from "./launch/project-report.js";

export async function runProjects(options: ProjectsCommandOptions): Promise<void> {
  const cwd = process.cwd();
  const config = loadLauncherConfig(cwd, options.config);
  const root = resolve(cwd, options.projectsDir ?? config.projectsDir ?? DEFAULT_PROJECTS_DIR);

  const listing = await listProjects(root);
  const databases = await countArtifacts(root);
  const [summary, ...rows] = describeProjects(listing);
  log.info(`${summary ?? ""} in ${root}`);
  if (rows.length > 0) {
    log.message(rows.join("\n"));
  }
  log.info(`Project databases: ${databases}`);
}
