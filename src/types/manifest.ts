/** One entry of the generated entry-point index (`entry-points.json`). */
export type EntryPointIndexEntry = {
  name: string;
  command: string;
  filePath: string;
  function: string;
  default: boolean;
  workdir?: string;
};

export type EntryPointIndex = {
  entryPoints: EntryPointIndexEntry[];
};

export type ManifestFile = {
  path: string;
  sha256: string;
  bytes: number;
};

/**
 * `manifest.json` embedded in every package. Carries no clock values so that
 * identical inputs produce identical archives.
 */
export type PackageManifestFile = {
  schema_version: string;
  name: string;
  version: string;
  entrypoints: string[];
  files: ManifestFile[];
};
