import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import JSZip from "jszip";
import { PackageContractValidator, validateArchive, validatePackage } from "../src/contract/validator.js";
import { PackageArchiveWriter } from "../src/artifact-writer/writer.js";
import {
  ArtifactNotFoundError,
  ForbiddenContentError,
  IntegrityError,
  InvalidArchiveError,
  ManifestInvalidError,
  MissingRequiredFileError,
  NameMismatchError,
  VersionMismatchError,
} from "../src/errors.js";
import { makeTempDir } from "./fixtures.js";

const PROJECT_YAML = "name: demo\nversion: 2.0.0\nentrypoints:\n  - name: main\n    command: main:main\n    default: true\n";
const INDEX_JSON = JSON.stringify({
  entryPoints: [{ name: "main", command: "main:main", filePath: "main.py", function: "main", default: true }],
});

function baseEntries(): Record<string, string> {
  return {
    "bvproject.yaml": PROJECT_YAML,
    "entry-points.json": INDEX_JSON,
    "pyproject.toml": "[project]\n",
    "main.py": "def main():\n    pass\n",
  };
}

async function zipOf(entries: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) zip.file(name, content, { createFolders: false });
  return zip.generateAsync({ type: "uint8array" });
}

describe("validateArchive", () => {
  it("accepts a package that satisfies the contract", async () => {
    const contents = await validateArchive(await zipOf(baseEntries()));
    expect(contents.name).toBe("demo");
    expect(contents.version.toString()).toBe("2.0.0");
    expect(contents.entrypoints.map((e) => e.name)).toEqual(["main"]);
    expect(contents.files).toEqual(["bvproject.yaml", "entry-points.json", "main.py", "pyproject.toml"]);
  });

  it("rejects bytes that are not a zip", async () => {
    await expect(validateArchive(new TextEncoder().encode("plain text"))).rejects.toBeInstanceOf(InvalidArchiveError);
  });

  it.each(["bvproject.yaml", "entry-points.json", "pyproject.toml"])("requires %s", async (file) => {
    const entries = baseEntries();
    delete entries[file];
    const err = await validateArchive(await zipOf(entries)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MissingRequiredFileError);
    expect(err).toMatchObject({ file });
  });

  it.each(["foo/.venv/bar", "__pycache__/x.pyc", "src/.git/config", "dist/old.bvpackage"])(
    "rejects forbidden entry %s",
    async (entry) => {
      const err = await validateArchive(await zipOf({ ...baseEntries(), [entry]: "x" })).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ForbiddenContentError);
      expect(err).toMatchObject({ path: entry });
    },
  );

  it.each(["../evil.py", "a/../../evil.py"])("rejects entry %s that climbs out of the archive", async (entry) => {
    const err = await validateArchive(await zipOf({ ...baseEntries(), [entry]: "x" })).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ForbiddenContentError);
    expect(err).toMatchObject({ path: entry });
  });

  it("rejects an invalid project document", async () => {
    const entries = { ...baseEntries(), "bvproject.yaml": "name: demo\nversion: 2.0.0\nentrypoints: []\n" };
    await expect(validateArchive(await zipOf(entries))).rejects.toBeInstanceOf(ManifestInvalidError);
  });

  it("rejects a non-SemVer version", async () => {
    const entries = { ...baseEntries(), "bvproject.yaml": PROJECT_YAML.replace("2.0.0", "latest") };
    await expect(validateArchive(await zipOf(entries))).rejects.toThrow("Invalid SemVer 'latest'");
  });

  it("rejects an index that disagrees with the project entrypoints", async () => {
    const entries = {
      ...baseEntries(),
      "entry-points.json": JSON.stringify({
        entryPoints: [{ name: "other", command: "main:main", filePath: "main.py", function: "main", default: true }],
      }),
    };
    await expect(validateArchive(await zipOf(entries))).rejects.toBeInstanceOf(ManifestInvalidError);
  });

  it("checks the expected name and version", async () => {
    const bytes = await zipOf(baseEntries());
    await expect(validateArchive(bytes, { name: "other" })).rejects.toBeInstanceOf(NameMismatchError);
    await expect(validateArchive(bytes, { version: "2.0.1" })).rejects.toBeInstanceOf(VersionMismatchError);
    await expect(validateArchive(bytes, { name: "demo", version: "2.0.0" })).resolves.toMatchObject({ name: "demo" });
  });

  describe("embedded manifest", () => {
    async function writerPackage(tamper?: (writer: PackageArchiveWriter) => void): Promise<Uint8Array> {
      const writer = new PackageArchiveWriter();
      for (const [name, content] of Object.entries(baseEntries())) writer.add(name, content);
      writer.writeManifest({ name: "demo", version: "2.0.0", entrypoints: ["main"] });
      tamper?.(writer);
      return writer.generate();
    }

    it("accepts matching digests", async () => {
      const contents = await validateArchive(await writerPackage());
      expect(contents.files).toContain("manifest.json");
    });

    it("rejects a file the manifest does not list", async () => {
      const bytes = await writerPackage((w) => w.add("extra.py", "x = 1\n"));
      const err = await validateArchive(bytes).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IntegrityError);
      expect(err).toMatchObject({ path: "extra.py" });
    });

    it("rejects modified content", async () => {
      const zip = await JSZip.loadAsync(await writerPackage());
      zip.file("main.py", "def main():\n    return 1\n");
      const err = await validateArchive(await zip.generateAsync({ type: "uint8array" })).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IntegrityError);
      expect(err).toMatchObject({ path: "main.py" });
    });
  });
});

describe("validatePackage", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("contract");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("fails for a missing file", async () => {
    await expect(validatePackage(path.join(tmpDir, "none.bvpackage"))).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it("validates a package on disk with fixed expectations", async () => {
    const file = path.join(tmpDir, "demo-2.0.0.bvpackage");
    fs.writeFileSync(file, await zipOf(baseEntries()));
    const validator = new PackageContractValidator({ name: "demo", version: "2.0.0" });
    await expect(validator.validate(file)).resolves.toMatchObject({ name: "demo", files: expect.arrayContaining(["main.py"]) });
    await expect(new PackageContractValidator({ version: "9.9.9" }).validate(file)).rejects.toBeInstanceOf(
      VersionMismatchError,
    );
  });
});
