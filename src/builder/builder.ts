import fs from "node:fs";
import path from "node:path";
import type { ProjectConfig } from "../project/config.js";
import { PackageArchiveWriter, DEFAULT_COMPRESSION_LEVEL } from "../artifact-writer/writer.js";
import { computeSha256FromContent } from "../artifact-writer/checksum.js";
import { MANIFEST_FILE } from "../artifact-writer/manifest-builder.js";
import { atomicWriteFile } from "../artifact-writer/atomic.js";
import { validateArchive } from "../contract/validator.js";
import { planBuild, type BuildPlan } from "./file-set.js";
import { LOCK_FILE, renderLockFile, type DependencyLockProvider } from "../lock/provider.js";
import { ArchiveWriteError, BvpackError } from "../errors.js";
import type { PackageManifestFile } from "../types/manifest.js";

export type BuilderSettings = {
  distDir: string;
  artifactExtension: string;
  compressionLevel: number;
  /** Skipped when collecting the project tree, relative to the project root. */
  publishDir?: string;
  /** Glob patterns for project files left out of the package. */
  exclude?: readonly string[];
};

export const DEFAULT_BUILDER_SETTINGS: BuilderSettings = {
  distDir: "dist",
  artifactExtension: "bvpackage",
  compressionLevel: DEFAULT_COMPRESSION_LEVEL,
  publishDir: "published",
};

export type BuildOptions = {
  outputPath?: string;
  /** Compute the output path only; nothing is read from the environment or written. */
  dryRun?: boolean;
};

export type BuildResult = {
  artifactPath: string;
  written: boolean;
  /** Present when the archive was produced. */
  manifest?: PackageManifestFile;
  sha256?: string;
};

export type AssembledPackage = {
  bytes: Buffer;
  manifest: PackageManifestFile;
  plan: BuildPlan;
};

/**
 * Builds deterministic packages from a project directory. Building never
 * changes the project's version.
 */
export class PackageBuilder {
  private readonly settings: BuilderSettings;

  constructor(
    private readonly lockProvider: DependencyLockProvider,
    settings: Partial<BuilderSettings> = {},
  ) {
    this.settings = { ...DEFAULT_BUILDER_SETTINGS, ...settings };
  }

  /** File name a build of `config` produces: `<name>-<version>.<ext>`. */
  artifactFileName(config: ProjectConfig): string {
    return `${config.name}-${config.version.toString()}.${this.settings.artifactExtension}`;
  }

  /** `<projectRoot>/<distDir>/<name>-<version>.<ext>` unless `outputPath` is given. */
  resolveOutputPath(config: ProjectConfig, projectRoot: string, outputPath?: string): string {
    if (outputPath) return path.resolve(outputPath);
    return path.resolve(projectRoot, this.settings.distDir, this.artifactFileName(config));
  }

  plan(config: ProjectConfig, projectRoot: string, extraIncludes: readonly string[] = [], outputPath?: string): BuildPlan {
    const ignore = [path.resolve(projectRoot, this.settings.distDir)];
    if (this.settings.publishDir) ignore.push(path.resolve(projectRoot, this.settings.publishDir));
    if (outputPath) ignore.push(path.resolve(outputPath));
    return planBuild(config, projectRoot, extraIncludes, {
      ignore,
      artifactExtension: this.settings.artifactExtension,
      exclude: this.settings.exclude,
    });
  }

  /** Archive bytes for the project, before anything touches disk. */
  async assemble(
    config: ProjectConfig,
    projectRoot: string,
    extraIncludes: readonly string[] = [],
    outputPath?: string,
  ): Promise<AssembledPackage> {
    const version = config.version.toString();
    const plan = this.plan(config, projectRoot, extraIncludes, outputPath);

    // manifest.json is always regenerated
    plan.files.delete(MANIFEST_FILE);
    const lock = await this.lockProvider.freeze(path.resolve(projectRoot, config.venvDir));
    plan.files.set(LOCK_FILE, { kind: "generated", content: renderLockFile(lock) });

    const writer = new PackageArchiveWriter(this.settings.compressionLevel);
    for (const [archivePath, source] of plan.files) {
      writer.add(archivePath, source.kind === "file" ? fs.readFileSync(source.sourcePath) : source.content);
    }
    const manifest = writer.writeManifest({
      name: config.name,
      version,
      entrypoints: config.entrypoints.map((e) => e.name),
    });

    return { bytes: await writer.generate(), manifest, plan };
  }

  async build(
    config: ProjectConfig,
    projectRoot: string,
    extraIncludes: readonly string[] = [],
    opts: BuildOptions = {},
  ): Promise<BuildResult> {
    const artifactPath = this.resolveOutputPath(config, projectRoot, opts.outputPath);
    if (opts.dryRun) return { artifactPath, written: false };

    const { bytes, manifest } = await this.assemble(config, projectRoot, extraIncludes, artifactPath);

    // the package must satisfy its own contract before it is written
    await validateArchive(bytes, { name: config.name, version: config.version });

    try {
      atomicWriteFile(artifactPath, bytes);
    } catch (e) {
      if (e instanceof BvpackError) throw e;
      throw new ArchiveWriteError(artifactPath, e);
    }

    return { artifactPath, written: true, manifest, sha256: computeSha256FromContent(bytes) };
  }
}
