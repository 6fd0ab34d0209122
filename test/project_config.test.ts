import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ProjectConfig } from "../src/project/config.js";
import { Version } from "../src/version/semver.js";
import {
  ConfigNotFoundError,
  ConfigParseError,
  DefaultEntrypointError,
  FormatError,
  NoEntrypointsError,
  SchemaError,
} from "../src/errors.js";
import { DEMO_MANIFEST, makeTempDir, writeFiles } from "./fixtures.js";

describe("ProjectConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("config");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads name, version and entrypoints in manifest order", async () => {
    writeFiles(tmpDir, { "bvproject.yaml": DEMO_MANIFEST });
    const config = await ProjectConfig.load(path.join(tmpDir, "bvproject.yaml"));

    expect(config.name).toBe("demo");
    expect(config.version.toString()).toBe("1.2.3");
    expect(config.entrypoints.map((e) => e.name)).toEqual(["main", "worker"]);
    expect(config.defaultEntrypoint.name).toBe("main");
    expect(config.entrypoints[1].workdir).toBe("app");
    expect(config.venvDir).toBe(".venv");
  });

  it("fails with ConfigNotFoundError for a missing file", async () => {
    await expect(ProjectConfig.load(path.join(tmpDir, "missing.yaml"))).rejects.toBeInstanceOf(ConfigNotFoundError);
  });

  it("fails with ConfigParseError for malformed YAML", async () => {
    writeFiles(tmpDir, { "bvproject.yaml": "name: [unclosed\n" });
    await expect(ProjectConfig.load(path.join(tmpDir, "bvproject.yaml"))).rejects.toBeInstanceOf(ConfigParseError);
  });

  it("rejects a manifest without a name", async () => {
    writeFiles(tmpDir, {
      "bvproject.yaml": "version: 1.0.0\nentrypoints:\n  - name: main\n    command: main:main\n    default: true\n",
    });
    await expect(ProjectConfig.load(path.join(tmpDir, "bvproject.yaml"))).rejects.toBeInstanceOf(SchemaError);
  });

  it("rejects an empty entrypoint list", async () => {
    await expect(
      ProjectConfig.fromDocument({ name: "demo", version: "1.0.0", entrypoints: [] }),
    ).rejects.toBeInstanceOf(NoEntrypointsError);
  });

  it("rejects two default entrypoints", async () => {
    const doc = {
      name: "demo",
      version: "1.0.0",
      entrypoints: [
        { name: "a", command: "a:run", default: true },
        { name: "b", command: "b:run", default: true },
      ],
    };
    const err = await ProjectConfig.fromDocument(doc).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DefaultEntrypointError);
    expect(err).toMatchObject({ defaultCount: 2 });
  });

  it("rejects a list with no default", async () => {
    const doc = { name: "demo", version: "1.0.0", entrypoints: [{ name: "a", command: "a:run" }] };
    await expect(ProjectConfig.fromDocument(doc)).rejects.toBeInstanceOf(DefaultEntrypointError);
  });

  it("rejects duplicate entrypoint names", async () => {
    const doc = {
      name: "demo",
      version: "1.0.0",
      entrypoints: [
        { name: "a", command: "a:run", default: true },
        { name: "a", command: "b:run" },
      ],
    };
    await expect(ProjectConfig.fromDocument(doc)).rejects.toThrow("'a' appears more than once");
  });

  it("rejects a malformed orchestrator url", async () => {
    const doc = {
      name: "demo",
      version: "1.0.0",
      entrypoints: [{ name: "a", command: "a:run", default: true }],
      orchestrator: { url: "not a url" },
    };
    await expect(ProjectConfig.fromDocument(doc)).rejects.toBeInstanceOf(SchemaError);
  });

  it("loads a non-SemVer version but reports it", async () => {
    const config = await ProjectConfig.fromDocument({
      name: "demo",
      version: "one",
      entrypoints: [{ name: "a", command: "a:run", default: true }],
    });
    const check = config.validateSemver();
    expect(check.ok).toBe(false);
    expect(config.rawVersion).toBe("one");
    expect(() => config.version).toThrow(FormatError);
  });

  it("saves the new version and keeps keys it does not interpret", async () => {
    const configPath = path.join(tmpDir, "bvproject.yaml");
    writeFiles(tmpDir, { "bvproject.yaml": DEMO_MANIFEST + "owner: platform-team\n" });

    const config = await ProjectConfig.load(configPath);
    config.withVersion(Version.parse("1.3.0")).save();

    const doc: unknown = YAML.parse(fs.readFileSync(configPath, "utf8"));
    expect(doc).toMatchObject({ name: "demo", version: "1.3.0", owner: "platform-team", venv_dir: ".venv" });
    const reloaded = await ProjectConfig.load(configPath);
    expect(reloaded.entrypoints).toEqual(config.entrypoints);
    expect(fs.readdirSync(tmpDir)).toEqual(["bvproject.yaml"]);
  });

  it("keeps unknown entrypoint keys when the entrypoint list changes", async () => {
    const configPath = path.join(tmpDir, "bvproject.yaml");
    writeFiles(tmpDir, {
      "bvproject.yaml": DEMO_MANIFEST.replace(
        "    default: true\n",
        "    default: true\n    description: nightly sync\n    timeout: 30\n",
      ),
    });

    const config = await ProjectConfig.load(configPath);
    const moved = config.entrypoints.map((e) => ({ ...e, default: e.name === "worker" }));
    config.withEntrypoints([...moved, { name: "extra", command: "app.jobs:work", default: false }]).save();

    const doc: unknown = YAML.parse(fs.readFileSync(configPath, "utf8"));
    expect(doc).toEqual({
      name: "demo",
      version: "1.2.3",
      venv_dir: ".venv",
      entrypoints: [
        { name: "main", command: "app.main:run", description: "nightly sync", timeout: 30 },
        { name: "worker", command: "app.jobs:work", workdir: "app", default: true },
        { name: "extra", command: "app.jobs:work" },
      ],
    });
  });

  it("writes orchestrator.url next to other orchestrator keys", async () => {
    const config = await ProjectConfig.fromDocument({
      name: "demo",
      version: "1.0.0",
      entrypoints: [{ name: "a", command: "a:run", default: true }],
      orchestrator: { url: "https://orchestrator.example.test/api", region: "eu" },
    });
    expect(config.orchestratorUrl).toBe("https://orchestrator.example.test/api");
    expect(config.toDocument().orchestrator).toEqual({ region: "eu", url: "https://orchestrator.example.test/api" });
  });

  it("create validates entrypoint invariants", () => {
    expect(() => ProjectConfig.create({ name: "demo", version: "0.0.0", entrypoints: [] })).toThrow(NoEntrypointsError);
    const config = ProjectConfig.create({
      name: "demo",
      version: "0.0.0",
      entrypoints: [{ name: "main", command: "main:main", default: true }],
    });
    expect(config.toDocument()).toEqual({
      name: "demo",
      version: "0.0.0",
      entrypoints: [{ name: "main", command: "main:main", default: true }],
      venv_dir: ".venv",
    });
  });
});
