import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { EntrypointRegistry, parseCommand } from "../src/entrypoints/registry.js";
import { ProjectConfig } from "../src/project/config.js";
import {
  DuplicateNameError,
  EntrypointValidationError,
  ImportValidationError,
  InvalidCommandError,
  NotFoundError,
  WorkdirMissingError,
} from "../src/errors.js";
import { makeTempDir, writeDemoProject, writeFiles } from "./fixtures.js";

describe("parseCommand", () => {
  it("splits module and function", () => {
    expect(parseCommand("app.main:run")).toEqual({ module: "app.main", func: "run" });
  });

  it.each(["app.main", "app.main:", ":run", "app/main:run", "app.main:run:extra", "app..main:run"])(
    "rejects %j",
    (command) => {
      expect(parseCommand(command)).toBeNull();
    },
  );
});

describe("EntrypointRegistry", () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = makeTempDir("entry");
    configPath = writeDemoProject(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("lists entrypoints in manifest order", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    expect(registry.names()).toEqual(["main", "worker"]);
    expect(registry.get("worker").command).toBe("app.jobs:work");
    expect(() => registry.get("nope")).toThrow(NotFoundError);
  });

  it("adds an entrypoint and persists it with the index", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    registry.add("report", "app.main:run");

    const reloaded = await ProjectConfig.load(configPath);
    expect(reloaded.entrypoints.map((e) => e.name)).toEqual(["main", "worker", "report"]);
    expect(reloaded.defaultEntrypoint.name).toBe("main");

    const index: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, "entry-points.json"), "utf8"));
    expect(index).toMatchObject({
      entryPoints: [
        { name: "main", filePath: "app/main.py", function: "run", default: true },
        { name: "worker", filePath: "app/jobs.py", function: "work", default: false, workdir: "app" },
        { name: "report", command: "app.main:run", default: false },
      ],
    });
  });

  it("moves the default flag when adding with setDefault", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    registry.add("report", "app.main:run", undefined, true);
    const reloaded = await ProjectConfig.load(configPath);
    expect(reloaded.entrypoints.filter((e) => e.default).map((e) => e.name)).toEqual(["report"]);
  });

  it("rejects a duplicate name and leaves the file unchanged", async () => {
    const before = fs.readFileSync(configPath, "utf8");
    const registry = await EntrypointRegistry.open(configPath);
    expect(() => registry.add("main", "app.main:run")).toThrow(DuplicateNameError);
    expect(fs.readFileSync(configPath, "utf8")).toBe(before);
  });

  it("rejects a malformed command", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    expect(() => registry.add("bad", "app.main")).toThrow(InvalidCommandError);
  });

  it("rejects a workdir outside the project", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    expect(() => registry.add("escape", "app.main:run", "../elsewhere")).toThrow(WorkdirMissingError);
  });

  it("setDefault leaves exactly one default", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    registry.setDefault("worker");
    const reloaded = await ProjectConfig.load(configPath);
    expect(reloaded.defaultEntrypoint.name).toBe("worker");
    expect(reloaded.entrypoints.filter((e) => e.default)).toHaveLength(1);
    expect(() => registry.setDefault("nope")).toThrow(NotFoundError);
  });

  it("in-memory registries do not touch disk", async () => {
    const config = await ProjectConfig.load(configPath);
    const before = fs.readFileSync(configPath, "utf8");
    const registry = new EntrypointRegistry(config, null);
    registry.add("extra", "app.main:run");
    expect(registry.names()).toEqual(["main", "worker", "extra"]);
    expect(fs.readFileSync(configPath, "utf8")).toBe(before);
    expect(fs.existsSync(path.join(tmpDir, "entry-points.json"))).toBe(false);
  });

  it("passes importability for a valid project", async () => {
    const registry = await EntrypointRegistry.open(configPath);
    expect(() => registry.validateImportability(tmpDir)).not.toThrow();
  });

  it("reports every failing entrypoint in one error", async () => {
    writeFiles(tmpDir, {
      "bvproject.yaml": [
        "name: demo",
        "version: 1.2.3",
        "entrypoints:",
        "  - name: main",
        "    command: app.main:run",
        "    default: true",
        "  - name: ghost",
        "    command: app.ghost:run",
        "  - name: typo",
        "    command: app.main:runn",
        "  - name: lost",
        "    command: app.main:run",
        "    workdir: nowhere",
        "",
      ].join("\n"),
    });
    const registry = await EntrypointRegistry.open(configPath);

    const err = (() => {
      try {
        registry.validateImportability(tmpDir);
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(EntrypointValidationError);
    if (!(err instanceof EntrypointValidationError)) return;

    expect(err.issues.map((i) => i.entrypoint)).toEqual(["ghost", "typo", "lost"]);
    expect(err.issues[0]).toBeInstanceOf(ImportValidationError);
    expect(err.issues[0].reason).toContain("cannot import module 'app.ghost'");
    expect(err.issues[1].reason).toBe("function 'runn' not found in module 'app.main'");
    expect(err.issues[2]).toBeInstanceOf(WorkdirMissingError);
  });
});
