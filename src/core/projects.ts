import { existsSync } from "node:fs";
import { mkdir, readdir } from "node:fs/promises";
import { join } from "node:path";

import type { ProjectDirectoryListing, ProjectEntry } from "./types.js";

export const PROJECT_DATABASE_EXTENSION = ".sqlite";

export async function ensureProjectsDirectory(root: string): Promise<boolean> {
  if (existsSync(root)) return false;
  await mkdir(root, { recursive: true });
  return true;
}

/** Snapshot of the project folders under `root`; recomputed on every call. */
export async function listProjects(root: string): Promise<ProjectDirectoryListing> {
  let entries;
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch {
    return { root, projects: [] };
  }

  const projects: ProjectEntry[] = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right))
    .map((name) => {
      const path = join(root, name);
      return {
        name,
        path,
        hasDatabase: existsSync(join(path, `${name}${PROJECT_DATABASE_EXTENSION}`))
      };
    });

  return { root, projects };
}

/** Counts files ending in `extension` anywhere below `root`. */
export async function countArtifacts(root: string, extension = PROJECT_DATABASE_EXTENSION): Promise<number> {
  let count = 0;

  async function walk(currentPath: string): Promise<void> {
    let entries;
    try {
      entries = await readdir(currentPath, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        await walk(join(currentPath, entry.name));
        continue;
      }
      if (entry.isFile() && entry.name.endsWith(extension)) {
        count += 1;
      }
    }
  }

  await walk(root);
  return count;
}
