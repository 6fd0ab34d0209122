import fs from "node:fs";
import JSZip from "jszip";
import YAML from "yaml";
import { ProjectConfig } from "../project/config.js";
import { Version } from "../version/semver.js";
import { createRegistry } from "../schema/registry.js";
import { computeSha256FromContent } from "../artifact-writer/checksum.js";
import { MANIFEST_FILE } from "../artifact-writer/manifest-builder.js";
import {
  ArtifactNotFoundError,
  ConfigError,
  ForbiddenContentError,
  IntegrityError,
  InvalidArchiveError,
  ManifestInvalidError,
  MissingRequiredFileError,
  NameMismatchError,
  VersionMismatchError,
  describeError,
} from "../errors.js";
import {
  ENTRY_POINTS_ENTRY,
  PROJECT_ENTRY,
  REQUIRED_ENTRIES,
  escapesRoot,
  hasForbiddenSegment,
} from "./rules.js";
import type { EntryPointIndexEntry, ManifestFile } from "../types/manifest.js";

export type ExpectedIdentity = {
  name?: string;
  version?: string | Version;
};

/** What a closed package says about itself. */
export type PackageContents = {
  name: string;
  version: Version;
  entrypoints: EntryPointIndexEntry[];
  /** File entries (no directories), sorted. */
  files: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Check package bytes against the contract. Depends only on the archive, never
 * on a live project directory.
 */
export async function validateArchive(bytes: Uint8Array, expected: ExpectedIdentity = {}): Promise<PackageContents> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (e) {
    throw new InvalidArchiveError(describeError(e), e);
  }

  const entryNames = Object.keys(zip.files);

  for (const required of REQUIRED_ENTRIES) {
    const entry = zip.file(required);
    if (!entry) throw new MissingRequiredFileError(required);
  }

  // loadAsync strips `..` and leading slashes from names; check what was stored
  for (const name of entryNames) {
    const stored = zip.files[name].unsafeOriginalName ?? name;
    if (escapesRoot(stored)) throw new ForbiddenContentError(stored, "escapes the archive root");
    if (hasForbiddenSegment(stored)) throw new ForbiddenContentError(stored);
  }

  const projectDoc = await readEntry(zip, PROJECT_ENTRY, (text): unknown => YAML.parse(text));
  let config: ProjectConfig;
  try {
    config = await ProjectConfig.fromDocument(projectDoc);
  } catch (e) {
    if (e instanceof ConfigError) throw new ManifestInvalidError(`${PROJECT_ENTRY}: ${e.message}`);
    throw e;
  }
  const semver = config.validateSemver();
  if (!semver.ok) throw new ManifestInvalidError(`${PROJECT_ENTRY}: ${semver.error.message}`);

  const registry = await createRegistry();

  const index = await readEntry(zip, ENTRY_POINTS_ENTRY, (text): unknown => JSON.parse(text));
  const indexCheck = await registry.validate("entry-points", index);
  if (!indexCheck.valid || !isRecord(index) || !Array.isArray(index.entryPoints)) {
    throw new ManifestInvalidError(`${ENTRY_POINTS_ENTRY}: ${indexCheck.errors ?? "expected an object"}`);
  }
  const entrypoints = index.entryPoints.filter(isRecord).map(toIndexEntry);
  const declared = config.entrypoints.map((e) => e.name).join(",");
  if (entrypoints.map((e) => e.name).join(",") !== declared) {
    throw new ManifestInvalidError(`${ENTRY_POINTS_ENTRY} does not list the entrypoints declared in ${PROJECT_ENTRY}`);
  }

  const files = entryNames.filter((n) => !zip.files[n].dir).sort();

  if (zip.file(MANIFEST_FILE)) {
    await checkIntegrity(zip, files, config.name, semver.version.toString());
  }

  if (expected.name !== undefined && expected.name !== config.name) {
    throw new NameMismatchError(expected.name, config.name);
  }
  if (expected.version !== undefined) {
    const want = expected.version.toString();
    const found = semver.version.toString();
    if (want !== found) throw new VersionMismatchError(want, found);
  }

  return { name: config.name, version: semver.version, entrypoints, files };
}

/** `validateArchive` for a package on disk. */
export async function validatePackage(archivePath: string, expected: ExpectedIdentity = {}): Promise<PackageContents> {
  if (!fs.existsSync(archivePath) || !fs.statSync(archivePath).isFile()) {
    throw new ArtifactNotFoundError(archivePath);
  }
  return validateArchive(fs.readFileSync(archivePath), expected);
}

export class PackageContractValidator {
  constructor(private readonly expected: ExpectedIdentity = {}) {}

  validate(archivePath: string): Promise<PackageContents> {
    return validatePackage(archivePath, this.expected);
  }
}

async function readEntry<T>(zip: JSZip, name: string, parse: (text: string) => T): Promise<T> {
  const entry = zip.file(name);
  if (!entry) throw new MissingRequiredFileError(name);
  const text = await entry.async("string");
  try {
    return parse(text);
  } catch (e) {
    throw new ManifestInvalidError(`${name}: ${describeError(e)}`);
  }
}

async function checkIntegrity(zip: JSZip, files: string[], name: string, version: string): Promise<void> {
  const manifest = await readEntry(zip, MANIFEST_FILE, (text): unknown => JSON.parse(text));
  const registry = await createRegistry();
  const check = await registry.validate("manifest", manifest);
  if (!check.valid || !isRecord(manifest) || !Array.isArray(manifest.files)) {
    throw new IntegrityError(MANIFEST_FILE, check.errors ?? "expected an object");
  }
  if (manifest.name !== name || manifest.version !== version) {
    throw new IntegrityError(
      MANIFEST_FILE,
      `declares ${String(manifest.name)}@${String(manifest.version)} but ${PROJECT_ENTRY} says ${name}@${version}`,
    );
  }

  const listed = new Map<string, ManifestFile>();
  for (const item of manifest.files.filter(isRecord)) {
    listed.set(String(item.path), { path: String(item.path), sha256: String(item.sha256), bytes: Number(item.bytes) });
  }

  for (const file of files) {
    if (file === MANIFEST_FILE) continue;
    const entry = listed.get(file);
    if (!entry) throw new IntegrityError(file, `not listed in ${MANIFEST_FILE}`);
    const data = await zip.files[file].async("uint8array");
    if (data.length !== entry.bytes) {
      throw new IntegrityError(file, `size mismatch: manifest=${entry.bytes} actual=${data.length}`);
    }
    const actual = computeSha256FromContent(data);
    if (actual !== entry.sha256) {
      throw new IntegrityError(file, `sha256 mismatch: manifest=${entry.sha256} actual=${actual}`);
    }
    listed.delete(file);
  }
  const [missing] = listed.keys();
  if (missing !== undefined) throw new IntegrityError(missing, "listed in manifest but not archived");
}

function toIndexEntry(item: Record<string, unknown>): EntryPointIndexEntry {
  const entry: EntryPointIndexEntry = {
    name: String(item.name),
    command: String(item.command),
    filePath: String(item.filePath),
    function: String(item.function),
    default: item.default === true,
  };
  if (typeof item.workdir === "string") entry.workdir = item.workdir;
  return entry;
}
