export interface ProjectEntry {
  name: string;
  path: string;
  hasDatabase: boolean;
}

export interface ProjectDirectoryListing {
  root: string;
  projects: ProjectEntry[];
}
