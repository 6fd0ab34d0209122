import fs from "node:fs";
import path from "node:path";

export type ResolvedModule = {
  module: string;
  filePath: string;
  /** `/`-separated, relative to the import root. */
  relativePath: string;
};

export type AttributeKind = "function" | "class" | "assignment" | "import";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Resolves dotted Python module names against a single import root and looks
 * up top-level bindings in the module source. Nothing is imported or run.
 *
 * A context is built for one validation call and discarded with it; it holds
 * no process-wide search path.
 */
export class ModuleResolutionContext {
  private readonly sources = new Map<string, string>();

  constructor(readonly importRoot: string) {}

  /** `pkg.mod` → `pkg/mod.py` or `pkg/mod/__init__.py`, or null. */
  resolveModule(moduleName: string): ResolvedModule | null {
    const parts = moduleName.split(".");
    if (parts.some((p) => !IDENTIFIER.test(p))) return null;

    const candidates = [
      path.join(this.importRoot, ...parts) + ".py",
      path.join(this.importRoot, ...parts, "__init__.py"),
    ];
    for (const filePath of candidates) {
      if (fs.existsSync(filePath) && fs.statSync(filePath).isFile()) {
        return {
          module: moduleName,
          filePath,
          relativePath: path.relative(this.importRoot, filePath).split(path.sep).join("/"),
        };
      }
    }
    return null;
  }

  /** Kind of the top-level binding `name` in the module, or null when absent. */
  findAttribute(mod: ResolvedModule, name: string): AttributeKind | null {
    return topLevelBindings(this.read(mod.filePath)).get(name) ?? null;
  }

  private read(filePath: string): string {
    let source = this.sources.get(filePath);
    if (source === undefined) {
      source = fs.readFileSync(filePath, "utf8");
      this.sources.set(filePath, source);
    }
    return source;
  }
}

/**
 * Names bound at module level: `def`/`async def`, `class`, simple and
 * annotated assignments, and `import`/`from ... import` targets. Lines inside
 * triple-quoted strings are skipped.
 */
export function topLevelBindings(source: string): Map<string, AttributeKind> {
  const bindings = new Map<string, AttributeKind>();
  const lines = source.replace(/\r\n?/g, "\n").split("\n");
  let inString: '"""' | "'''" | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (inString) {
      if (countOf(line, inString) % 2 === 1) inString = null;
      continue;
    }

    const topLevel = line.length > 0 && !/^\s/.test(line);
    if (topLevel) {
      let m: RegExpExecArray | null;
      if ((m = /^(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/.exec(line))) {
        bindings.set(m[1], "function");
      } else if ((m = /^class\s+([A-Za-z_]\w*)\b/.exec(line))) {
        bindings.set(m[1], "class");
      } else if ((m = /^from\s+\S+\s+import\s+(.*)$/.exec(line))) {
        let names = m[1].split("#")[0];
        if (names.trimStart().startsWith("(")) {
          while (!names.includes(")") && i + 1 < lines.length) {
            i++;
            names += " " + lines[i].split("#")[0];
          }
        }
        for (const bound of importedNames(names.replace(/[()]/g, " "), false)) bindings.set(bound, "import");
      } else if ((m = /^import\s+(.*)$/.exec(line))) {
        for (const bound of importedNames(m[1], true)) bindings.set(bound, "import");
      } else if ((m = /^([A-Za-z_]\w*)\s*(?::[^=]*)?=(?!=)/.exec(line))) {
        bindings.set(m[1], "assignment");
      }
    }

    for (const quote of ['"""', "'''"] as const) {
      if (countOf(line, quote) % 2 === 1) {
        inString = quote;
        break;
      }
    }
  }

  return bindings;
}

/** `a as b, c` → [b, c]; for plain `import a.b`, the bound name is `a`. */
function importedNames(list: string, dotted: boolean): string[] {
  const out: string[] = [];
  for (const part of list.split("#")[0].split(",")) {
    const tokens = part.trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0 || tokens[0] === "*") continue;
    const bound = tokens.length === 3 && tokens[1] === "as" ? tokens[2] : dotted ? tokens[0].split(".")[0] : tokens[0];
    if (IDENTIFIER.test(bound)) out.push(bound);
  }
  return out;
}

function countOf(line: string, needle: string): number {
  return line.split(needle).length - 1;
}
