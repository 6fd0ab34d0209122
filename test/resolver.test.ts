import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import { ModuleResolutionContext, topLevelBindings } from "../src/entrypoints/resolver.js";
import { makeTempDir, writeFiles } from "./fixtures.js";

describe("topLevelBindings", () => {
  it("finds functions, classes, assignments and imports", () => {
    const source = [
      "import os",
      "import a.b.c",
      "import numpy as np",
      "from pkg import helper, other as alias",
      "from pkg.mod import (",
      "    first,  # comment",
      "    second as renamed,",
      ")",
      "LIMIT: int = 5",
      "counter = 0",
      "",
      "def run(argv):",
      "    inner = 1",
      "",
      "async def serve():",
      "    pass",
      "",
      "class App(Base):",
      "    def method(self):",
      "        pass",
    ].join("\n");

    const bindings = topLevelBindings(source);
    expect(Object.fromEntries(bindings)).toEqual({
      os: "import",
      a: "import",
      np: "import",
      helper: "import",
      alias: "import",
      first: "import",
      renamed: "import",
      LIMIT: "assignment",
      counter: "assignment",
      run: "function",
      serve: "function",
      App: "class",
    });
  });

  it("ignores nested definitions and comparisons", () => {
    const bindings = topLevelBindings("if x == 1:\n    def hidden():\n        pass\n");
    expect(bindings.size).toBe(0);
  });

  it("skips definitions inside triple-quoted strings", () => {
    const source = ['"""', "def fake():", '"""', "def real():", "    pass"].join("\n");
    const bindings = topLevelBindings(source);
    expect(bindings.has("fake")).toBe(false);
    expect(bindings.get("real")).toBe("function");
  });
});

describe("ModuleResolutionContext", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("resolver");
    writeFiles(tmpDir, {
      "tool.py": "def main():\n    pass\n",
      "pkg/__init__.py": "VERSION = '1'\n",
      "pkg/cli.py": "def entry():\n    pass\n",
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("resolves modules and packages relative to the import root", () => {
    const context = new ModuleResolutionContext(tmpDir);
    expect(context.resolveModule("tool")?.relativePath).toBe("tool.py");
    expect(context.resolveModule("pkg")?.relativePath).toBe("pkg/__init__.py");
    expect(context.resolveModule("pkg.cli")?.relativePath).toBe("pkg/cli.py");
    expect(context.resolveModule("pkg.missing")).toBeNull();
    expect(context.resolveModule("../tool")).toBeNull();
  });

  it("looks up attributes in the resolved module", () => {
    const context = new ModuleResolutionContext(tmpDir);
    const mod = context.resolveModule("pkg.cli");
    expect(mod).not.toBeNull();
    if (!mod) return;
    expect(context.findAttribute(mod, "entry")).toBe("function");
    expect(context.findAttribute(mod, "absent")).toBeNull();
  });

  it("does not share lookups between contexts", () => {
    const first = new ModuleResolutionContext(tmpDir);
    expect(first.resolveModule("later")).toBeNull();
    writeFiles(tmpDir, { "later.py": "def go():\n    pass\n" });
    const second = new ModuleResolutionContext(tmpDir);
    expect(second.resolveModule("later")?.module).toBe("later");
  });
});
