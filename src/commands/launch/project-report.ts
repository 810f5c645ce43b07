import { log } from "@clack/prompts";

import { ensureProjectsDirectory, listProjects } from "../../core/projects.js";
import type { ProjectDirectoryListing } from "../../core/types.js";

export function describeProjects(listing: ProjectDirectoryListing): string[] {
  const lines = [`Found ${listing.projects.length} existing projects`];
  for (const project of listing.projects) {
    lines.push(`  ${project.name} (${project.hasDatabase ? "with database" : "no database"})`);
  }
  return lines;
}

export async function reportProjects(root: string): Promise<ProjectDirectoryListing> {
  if (await ensureProjectsDirectory(root)) {
    log.info(`Created projects directory at ${root}`);
    return { root, projects: [] };
  }

  const listing = await listProjects(root);
  const [summary, ...rows] = describeProjects(listing);
  log.info(summary ?? "");
  if (rows.length > 0) {
    log.message(rows.join("\n"));
  }
  return listing;
}
