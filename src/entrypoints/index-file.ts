import path from "node:path";
import type { ProjectConfig } from "../project/config.js";
import type { EntryPointIndex, EntryPointIndexEntry } from "../types/manifest.js";
import { atomicWriteFile } from "../artifact-writer/atomic.js";

export const ENTRY_POINTS_FILE = "entry-points.json";

/** Mirrors the manifest's entrypoints section, in manifest order. */
export function buildEntryPointIndex(config: ProjectConfig): EntryPointIndex {
  return {
    entryPoints: config.entrypoints.map((entry) => {
      const [moduleName, func] = entry.command.split(":", 2);
      const item: EntryPointIndexEntry = {
        name: entry.name,
        command: entry.command,
        filePath: `${moduleName.split(".").join("/")}.py`,
        function: func ?? "",
        default: entry.default,
      };
      if (entry.workdir) item.workdir = entry.workdir;
      return item;
    }),
  };
}

export function renderEntryPointIndex(config: ProjectConfig): string {
  return JSON.stringify(buildEntryPointIndex(config), null, 2) + "\n";
}

/** Regenerate `entry-points.json` beside the manifest. */
export function writeEntryPointIndex(config: ProjectConfig, projectRoot: string): string {
  const target = path.join(projectRoot, ENTRY_POINTS_FILE);
  atomicWriteFile(target, renderEntryPointIndex(config));
  return target;
}
