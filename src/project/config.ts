import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { Version } from "../version/semver.js";
import { createRegistry } from "../schema/registry.js";
import { atomicWriteFile } from "../artifact-writer/atomic.js";
import {
  ConfigNotFoundError,
  ConfigParseError,
  describeError,
  DefaultEntrypointError,
  FormatError,
  NoEntrypointsError,
  SchemaError,
} from "../errors.js";
import type { EntrypointDocument, ProjectDocument } from "../types/project.js";

export const PROJECT_FILE = "bvproject.yaml";
export const DEFAULT_VENV_DIR = ".venv";

export type Entrypoint = Readonly<{
  name: string;
  /** `module:function`, module dotted and relative to the project root. */
  command: string;
  /** Relative to the project root, `/`-separated. */
  workdir?: string;
  default: boolean;
}>;

export type SemverCheck = { ok: true; version: Version } | { ok: false; error: FormatError };

export type ProjectConfigInit = {
  name: string;
  version: string;
  entrypoints: Entrypoint[];
  venvDir?: string;
  orchestratorUrl?: string;
};

type Fields = {
  name: string;
  version: string;
  entrypoints: readonly Entrypoint[];
  venvDir: string;
  orchestratorUrl?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Throws when the list breaks the exactly-one-default or unique-name rules. */
export function assertEntrypointInvariants(entrypoints: readonly Entrypoint[]): void {
  if (entrypoints.length === 0) throw new NoEntrypointsError();

  const seen = new Set<string>();
  for (const entry of entrypoints) {
    if (seen.has(entry.name)) {
      throw new SchemaError(`entrypoint names must be unique; '${entry.name}' appears more than once`);
    }
    seen.add(entry.name);
  }

  const defaults = entrypoints.filter((e) => e.default).length;
  if (defaults !== 1) throw new DefaultEntrypointError(defaults);
}

/**
 * Typed model of `bvproject.yaml`.
 *
 * Instances are immutable; entrypoint and version changes produce a new
 * instance that the caller persists with `save`. Keys this model does not
 * interpret, at the top level or on an entrypoint, are written back unchanged.
 */
export class ProjectConfig {
  readonly name: string;
  readonly entrypoints: readonly Entrypoint[];
  readonly venvDir: string;
  readonly orchestratorUrl?: string;
  private readonly versionText: string;

  private constructor(
    fields: Fields,
    /** File this config was loaded from, if any. */
    readonly sourcePath: string | null,
    private readonly raw: Readonly<Record<string, unknown>>,
  ) {
    this.name = fields.name;
    this.versionText = fields.version;
    this.entrypoints = Object.freeze(fields.entrypoints.map((e) => Object.freeze({ ...e })));
    this.venvDir = fields.venvDir;
    this.orchestratorUrl = fields.orchestratorUrl;
  }

  static async load(configPath: string): Promise<ProjectConfig> {
    const resolved = path.resolve(configPath);
    if (!fs.existsSync(resolved)) throw new ConfigNotFoundError(resolved);

    const text = fs.readFileSync(resolved, "utf8");
    let doc: unknown;
    try {
      doc = YAML.parse(text);
    } catch (e) {
      throw new ConfigParseError(resolved, describeError(e), e);
    }

    return ProjectConfig.fromDocument(doc ?? {}, resolved);
  }

  /** Validate a parsed manifest document (schema, then entrypoint invariants). */
  static async fromDocument(doc: unknown, sourcePath: string | null = null): Promise<ProjectConfig> {
    const registry = await createRegistry();
    const { valid, errors } = await registry.validate("bvproject", doc);
    if (!valid || !isRecord(doc)) {
      throw new SchemaError(`Invalid ${PROJECT_FILE}: ${errors ?? "root must be a mapping"}`);
    }

    const entrypoints = readEntrypoints(doc.entrypoints);
    assertEntrypointInvariants(entrypoints);

    const orchestrator = doc.orchestrator;
    const url = isRecord(orchestrator) && typeof orchestrator.url === "string" ? orchestrator.url : undefined;

    return new ProjectConfig(
      {
        name: String(doc.name),
        version: String(doc.version),
        entrypoints,
        venvDir: typeof doc.venv_dir === "string" ? doc.venv_dir : DEFAULT_VENV_DIR,
        orchestratorUrl: url,
      },
      sourcePath,
      doc,
    );
  }

  /** New in-memory config (not yet saved). */
  static create(init: ProjectConfigInit): ProjectConfig {
    if (!init.name) throw new SchemaError("project.name is required");
    assertEntrypointInvariants(init.entrypoints);
    return new ProjectConfig(
      { ...init, venvDir: init.venvDir ?? DEFAULT_VENV_DIR },
      null,
      {},
    );
  }

  /** Parsed version; throws FormatError when the stored text is not SemVer. */
  get version(): Version {
    return Version.parse(this.versionText);
  }

  /** The version exactly as written in the manifest. */
  get rawVersion(): string {
    return this.versionText;
  }

  get defaultEntrypoint(): Entrypoint {
    const found = this.entrypoints.find((e) => e.default);
    // guaranteed by assertEntrypointInvariants
    if (!found) throw new DefaultEntrypointError(0);
    return found;
  }

  /** Re-validate the version field; reports instead of throwing. */
  validateSemver(): SemverCheck {
    try {
      return { ok: true, version: Version.parse(this.versionText) };
    } catch (e) {
      if (e instanceof FormatError) return { ok: false, error: e };
      throw e;
    }
  }

  withVersion(version: Version): ProjectConfig {
    return new ProjectConfig({ ...this.fields(), version: version.toString() }, this.sourcePath, this.raw);
  }

  withEntrypoints(entrypoints: readonly Entrypoint[]): ProjectConfig {
    assertEntrypointInvariants(entrypoints);
    return new ProjectConfig({ ...this.fields(), entrypoints }, this.sourcePath, this.raw);
  }

  /** Document as written to disk; unknown keys keep their original position. */
  toDocument(): ProjectDocument {
    const extras = unknownEntrypointFields(this.raw.entrypoints);
    const doc: ProjectDocument = {
      ...this.raw,
      name: this.name,
      version: this.versionText,
      entrypoints: this.entrypoints.map((e) => toEntrypointDocument(e, extras.get(e.name))),
      venv_dir: this.venvDir,
    };
    if (this.orchestratorUrl !== undefined) {
      const current = this.raw.orchestrator;
      doc.orchestrator = { ...(isRecord(current) ? current : {}), url: this.orchestratorUrl };
    }
    return doc;
  }

  toYaml(): string {
    return YAML.stringify(this.toDocument());
  }

  /** Write the full document atomically to `targetPath` (default: where it was loaded from). */
  save(targetPath?: string): string {
    const target = targetPath ?? this.sourcePath;
    if (!target) throw new Error("ProjectConfig.save needs a path for a config that was not loaded from disk");
    atomicWriteFile(target, this.toYaml());
    return target;
  }

  private fields(): Fields {
    return {
      name: this.name,
      version: this.versionText,
      entrypoints: this.entrypoints,
      venvDir: this.venvDir,
      orchestratorUrl: this.orchestratorUrl,
    };
  }
}

function readEntrypoints(value: unknown): Entrypoint[] {
  if (!Array.isArray(value)) return [];
  const result: Entrypoint[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const entry: { name: string; command: string; workdir?: string; default: boolean } = {
      name: String(item.name),
      command: String(item.command),
      default: item.default === true,
    };
    if (typeof item.workdir === "string") entry.workdir = toPosix(item.workdir);
    result.push(entry);
  }
  return result;
}

const ENTRYPOINT_KEYS: ReadonlySet<string> = new Set(["name", "command", "workdir", "default"]);

/** Uninterpreted keys of each loaded entrypoint, by entrypoint name. */
function unknownEntrypointFields(value: unknown): Map<string, Record<string, unknown>> {
  const byName = new Map<string, Record<string, unknown>>();
  if (!Array.isArray(value)) return byName;
  for (const item of value) {
    if (!isRecord(item) || typeof item.name !== "string") continue;
    const extra = Object.fromEntries(Object.entries(item).filter(([key]) => !ENTRYPOINT_KEYS.has(key)));
    byName.set(item.name, extra);
  }
  return byName;
}

function toEntrypointDocument(entry: Entrypoint, extra: Record<string, unknown> = {}): EntrypointDocument {
  const doc: EntrypointDocument = { ...extra, name: entry.name, command: entry.command };
  if (entry.workdir) doc.workdir = entry.workdir;
  if (entry.default) doc.default = true;
  return doc;
}

export function toPosix(p: string): string {
  return p.split(path.sep).join("/").replace(/\\/g, "/");
}
