import fs from "node:fs";
import path from "node:path";
import { ProjectConfig } from "../project/config.js";
import { EntrypointRegistry } from "../entrypoints/registry.js";
import type { PackageBuilder } from "../builder/builder.js";
import { validatePackage } from "../contract/validator.js";
import { atomicCopyFile } from "../artifact-writer/atomic.js";
import type { BumpLevel } from "../version/semver.js";
import { nextState, type PublishEvent, type PublishState } from "./state-machine.js";
import { ArtifactExistsError, SourceArtifactMissingError } from "../errors.js";

export type PublishOptions = {
  /** Existing package to publish; when absent the project is bumped and built. */
  artifactPath?: string;
  bump?: BumpLevel;
  move?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  extraIncludes?: readonly string[];
  /** Root of `<publishDir>/<name>/<version>/`. */
  publishDir: string;
};

export type PublishResult = {
  destination: string;
  artifactPath: string;
  name: string;
  version: string;
  previousVersion: string;
  dryRun: boolean;
  /** States visited, starting with `idle`. */
  states: PublishState[];
};

/**
 * Publish workflow: bump → persist → build → place.
 *
 * The bumped version is written to the manifest before anything is built, so
 * a failure later never loses it. A dry run computes the same destination and
 * touches nothing.
 */
export class PublishOrchestrator {
  private readonly projectRoot: string;

  constructor(
    private readonly configPath: string,
    private readonly builder: PackageBuilder,
    projectRoot?: string,
  ) {
    this.projectRoot = path.resolve(projectRoot ?? path.dirname(path.resolve(configPath)));
  }

  async publish(opts: PublishOptions): Promise<PublishResult> {
    const config = await ProjectConfig.load(this.configPath);
    const current = config.version;
    new EntrypointRegistry(config, null).validateImportability(this.projectRoot);

    const publishRoot = path.resolve(opts.publishDir);
    const states: PublishState[] = ["idle"];
    const advance = (event: PublishEvent) => {
      states.push(nextState(states[states.length - 1], event));
    };

    if (opts.artifactPath !== undefined) {
      const source = path.resolve(opts.artifactPath);
      if (!fs.existsSync(source)) throw new SourceArtifactMissingError(source);

      const contents = await validatePackage(source, { name: config.name, version: current });
      const destination = destinationFor(publishRoot, contents.name, contents.version.toString(), source);
      const result: PublishResult = {
        destination,
        artifactPath: source,
        name: contents.name,
        version: contents.version.toString(),
        previousVersion: current.toString(),
        dryRun: opts.dryRun === true,
        states,
      };
      if (opts.dryRun) return result;

      assertWritable(destination, opts.overwrite);
      advance("adopt");
      place(source, destination, opts.move === true);
      advance("place");
      return result;
    }

    const bumped = config.withVersion(current.bump(opts.bump ?? "patch"));
    const plannedArtifact = this.builder.resolveOutputPath(bumped, this.projectRoot);
    const plannedDestination = destinationFor(publishRoot, bumped.name, bumped.rawVersion, plannedArtifact);

    if (opts.dryRun) {
      return {
        destination: plannedDestination,
        artifactPath: plannedArtifact,
        name: bumped.name,
        version: bumped.rawVersion,
        previousVersion: current.toString(),
        dryRun: true,
        states,
      };
    }

    assertWritable(plannedDestination, opts.overwrite);

    bumped.save(config.sourcePath ?? this.configPath);
    advance("bump");

    const build = await this.builder.build(bumped, this.projectRoot, opts.extraIncludes ?? []);
    await validatePackage(build.artifactPath, { name: bumped.name, version: bumped.version });
    advance("build");

    const destination = destinationFor(publishRoot, bumped.name, bumped.rawVersion, build.artifactPath);
    assertWritable(destination, opts.overwrite);
    place(build.artifactPath, destination, opts.move === true);
    advance("place");

    return {
      destination,
      artifactPath: build.artifactPath,
      name: bumped.name,
      version: bumped.rawVersion,
      previousVersion: current.toString(),
      dryRun: false,
      states,
    };
  }
}

export function destinationFor(publishRoot: string, name: string, version: string, artifactPath: string): string {
  return path.join(publishRoot, name, version, path.basename(artifactPath));
}

function assertWritable(destination: string, overwrite?: boolean): void {
  if (fs.existsSync(destination) && !overwrite) throw new ArtifactExistsError(destination);
}

/** Copy through a temp file; on move the source goes only after the rename landed. */
function place(source: string, destination: string, move: boolean): void {
  if (path.resolve(source) === path.resolve(destination)) return;
  atomicCopyFile(source, destination);
  if (move) fs.rmSync(source);
}
