import JSZip from "jszip";
import { computeSha256FromContent } from "./checksum.js";
import { buildManifest, compareArchivePaths, MANIFEST_FILE, renderManifest } from "./manifest-builder.js";
import type { ManifestFile, PackageManifestFile } from "../types/manifest.js";

/** Every entry is stamped with this instant (the earliest a zip can hold). */
export const FIXED_ENTRY_DATE = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

export const DEFAULT_COMPRESSION_LEVEL = 9;

/** `a\b/./c` → `a/b/c`; archive paths are always `/`-separated and relative. */
export function normalizeArchivePath(p: string): string {
  return p
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".")
    .join("/");
}

/**
 * Collects package entries in memory and emits a byte-reproducible zip:
 * entries sorted by path, fixed timestamps, no directory entries, fixed
 * compression settings.
 */
export class PackageArchiveWriter {
  private readonly entries = new Map<string, Buffer>();

  constructor(private readonly compressionLevel = DEFAULT_COMPRESSION_LEVEL) {}

  add(archivePath: string, content: string | Uint8Array): void {
    const normalized = normalizeArchivePath(archivePath);
    if (!normalized) throw new Error(`Empty archive path: '${archivePath}'`);
    if (this.entries.has(normalized)) throw new Error(`Duplicate archive entry: ${normalized}`);
    this.entries.set(normalized, Buffer.from(content));
  }

  has(archivePath: string): boolean {
    return this.entries.has(normalizeArchivePath(archivePath));
  }

  /** Path, digest and size of every entry added so far. */
  getFiles(): ManifestFile[] {
    return [...this.entries.entries()]
      .map(([path, data]) => ({ path, sha256: computeSha256FromContent(data), bytes: data.length }))
      .sort((a, b) => compareArchivePaths(a.path, b.path));
  }

  /** Add `manifest.json` covering every entry added before it. */
  writeManifest(opts: { name: string; version: string; entrypoints: readonly string[] }): PackageManifestFile {
    const manifest = buildManifest({ ...opts, files: this.getFiles() });
    this.add(MANIFEST_FILE, renderManifest(manifest));
    return manifest;
  }

  async generate(): Promise<Buffer> {
    const zip = new JSZip();
    const paths = [...this.entries.keys()].sort(compareArchivePaths);
    for (const p of paths) {
      const data = this.entries.get(p);
      if (!data) continue;
      zip.file(p, data, { binary: true, date: FIXED_ENTRY_DATE, createFolders: false });
    }

    return zip.generateAsync({
      type: "nodebuffer",
      compression: this.compressionLevel === 0 ? "STORE" : "DEFLATE",
      compressionOptions: { level: this.compressionLevel },
      platform: "DOS",
    });
  }
}
