import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { ProjectConfig } from "../project/config.js";
import { renderEntryPointIndex } from "../entrypoints/index-file.js";
import {
  ENTRY_POINTS_ENTRY,
  FORBIDDEN_SEGMENTS,
  PROJECT_ENTRY,
  PYPROJECT_ENTRY,
  hasForbiddenSegment,
} from "../contract/rules.js";
import { ForbiddenContentError, IncludeNotFoundError, MissingRequiredFileError } from "../errors.js";

export type BuildSource =
  | { kind: "file"; sourcePath: string }
  | { kind: "generated"; content: string };

/** Computed fresh for every build; never persisted. */
export type BuildPlan = {
  /** archive path → source, `/`-separated archive paths */
  files: Map<string, BuildSource>;
  excludedDirs: readonly string[];
  extraIncludes: readonly string[];
};

export type PlanOptions = {
  /** Absolute paths skipped by the tree walk (venv, publish dir, output file). */
  ignore?: readonly string[];
  /** Files with this extension are previously built packages and are skipped. */
  artifactExtension?: string;
  /** Glob patterns matched against archive paths during the tree walk. */
  exclude?: readonly string[];
};

function toArchivePath(root: string, absolute: string): string {
  return path.relative(root, absolute).split(path.sep).join("/");
}

function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Regular files under `dir`, skipping forbidden names (files or directories) at any depth and
 * anything in `ignore`. Symlinks are not followed.
 */
function walk(
  root: string,
  dir: string,
  ignore: ReadonlySet<string>,
  skipFile: (archivePath: string) => boolean,
  out: Map<string, BuildSource>,
): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (ignore.has(full) || FORBIDDEN_SEGMENTS.has(entry.name)) continue;
    if (entry.isDirectory()) {
      walk(root, full, ignore, skipFile, out);
    } else if (entry.isFile()) {
      const archivePath = toArchivePath(root, full);
      if (!skipFile(archivePath)) out.set(archivePath, { kind: "file", sourcePath: full });
    }
  }
}

/**
 * Union of the project tree, the contract files and `extraIncludes`.
 * `bvproject.yaml` and `entry-points.json` are always generated from `config`.
 */
export function planBuild(
  config: ProjectConfig,
  projectRoot: string,
  extraIncludes: readonly string[] = [],
  opts: PlanOptions = {},
): BuildPlan {
  const root = path.resolve(projectRoot);
  const files = new Map<string, BuildSource>();

  const ignore = new Set((opts.ignore ?? []).map((p) => path.resolve(root, p)));
  ignore.add(path.resolve(root, config.venvDir));
  const ext = opts.artifactExtension ? `.${opts.artifactExtension}` : null;
  const exclude = opts.exclude ?? [];
  const skipFile = (archivePath: string) =>
    (ext !== null && archivePath.endsWith(ext)) ||
    archivePath.endsWith(".tmp") ||
    exclude.some((pattern) => minimatch(archivePath, pattern, { dot: true }));

  walk(root, root, ignore, skipFile, files);

  const pyproject = path.join(root, PYPROJECT_ENTRY);
  if (!fs.existsSync(pyproject) || !fs.statSync(pyproject).isFile()) {
    throw new MissingRequiredFileError(PYPROJECT_ENTRY);
  }
  files.set(PYPROJECT_ENTRY, { kind: "file", sourcePath: pyproject });

  for (const include of extraIncludes) {
    const absolute = path.resolve(root, include);
    if (!isInside(root, absolute)) throw new IncludeNotFoundError(include, "is outside the project root");
    if (!fs.existsSync(absolute)) throw new IncludeNotFoundError(include);

    const rel = toArchivePath(root, absolute);
    if (rel && hasForbiddenSegment(rel)) throw new ForbiddenContentError(rel, "is under an excluded directory");

    if (fs.statSync(absolute).isDirectory()) {
      walk(root, absolute, new Set(), () => false, files);
    } else {
      files.set(rel, { kind: "file", sourcePath: absolute });
    }
  }

  files.set(PROJECT_ENTRY, { kind: "generated", content: config.toYaml() });
  files.set(ENTRY_POINTS_ENTRY, { kind: "generated", content: renderEntryPointIndex(config) });

  return {
    files,
    excludedDirs: [...FORBIDDEN_SEGMENTS],
    extraIncludes: [...extraIncludes],
  };
}
