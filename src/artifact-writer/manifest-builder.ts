import type { ManifestFile, PackageManifestFile } from "../types/manifest.js";

export const MANIFEST_FILE = "manifest.json";
export const MANIFEST_SCHEMA_VERSION = "1.0.0";

export type ManifestBuildInput = {
  name: string;
  version: string;
  entrypoints: readonly string[];
  files: readonly ManifestFile[];
};

/**
 * Package manifest: identity plus a digest for every other archive entry,
 * sorted by path. No timestamps, so rebuilding identical input is a no-op.
 */
export function buildManifest(input: ManifestBuildInput): PackageManifestFile {
  return {
    schema_version: MANIFEST_SCHEMA_VERSION,
    name: input.name,
    version: input.version,
    entrypoints: [...input.entrypoints],
    files: [...input.files]
      .filter((f) => f.path !== MANIFEST_FILE)
      .sort((a, b) => compareArchivePaths(a.path, b.path)),
  };
}

export function renderManifest(manifest: PackageManifestFile): string {
  return JSON.stringify(manifest, null, 2) + "\n";
}

/** Code-unit order; independent of the host locale. */
export function compareArchivePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
