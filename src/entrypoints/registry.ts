import fs from "node:fs";
import path from "node:path";
import { ProjectConfig, toPosix, type Entrypoint } from "../project/config.js";
import { ModuleResolutionContext } from "./resolver.js";
import { writeEntryPointIndex } from "./index-file.js";
import {
  DuplicateNameError,
  EntrypointValidationError,
  ImportValidationError,
  InvalidCommandError,
  NotFoundError,
  WorkdirMissingError,
  type EntrypointIssue,
} from "../errors.js";

export const COMMAND_PATTERN = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*:[A-Za-z_]\w*$/;

export type ParsedCommand = { module: string; func: string };

/** `pkg.mod:func` → parts, or null when the syntax is wrong. */
export function parseCommand(command: string): ParsedCommand | null {
  if (!COMMAND_PATTERN.test(command)) return null;
  const idx = command.indexOf(":");
  return { module: command.slice(0, idx), func: command.slice(idx + 1) };
}

/**
 * Entrypoint management on top of a ProjectConfig.
 *
 * Each mutation replaces the held config and, when the registry is bound to a
 * manifest file, persists it and regenerates `entry-points.json`.
 */
export class EntrypointRegistry {
  private config: ProjectConfig;

  constructor(
    config: ProjectConfig,
    private readonly configPath: string | null = config.sourcePath,
  ) {
    this.config = config;
  }

  static async open(configPath: string): Promise<EntrypointRegistry> {
    const config = await ProjectConfig.load(configPath);
    return new EntrypointRegistry(config, config.sourcePath);
  }

  get current(): ProjectConfig {
    return this.config;
  }

  list(): readonly Entrypoint[] {
    return this.config.entrypoints;
  }

  names(): string[] {
    return this.config.entrypoints.map((e) => e.name);
  }

  get(name: string): Entrypoint {
    const found = this.config.entrypoints.find((e) => e.name === name);
    if (!found) throw new NotFoundError(name);
    return found;
  }

  add(name: string, command: string, workdir?: string, setDefault = false): Entrypoint {
    if (this.config.entrypoints.some((e) => e.name === name)) throw new DuplicateNameError(name);
    if (!parseCommand(command)) throw new InvalidCommandError(name, command);

    const entry: { name: string; command: string; workdir?: string; default: boolean } = {
      name,
      command,
      default: setDefault,
    };
    if (workdir) {
      const rel = toPosix(path.normalize(workdir));
      if (path.isAbsolute(workdir) || rel === ".." || rel.startsWith("../")) {
        throw new WorkdirMissingError(name, `workdir must be a relative path inside the project: ${workdir}`);
      }
      entry.workdir = rel;
    }

    const others = setDefault
      ? this.config.entrypoints.map((e) => ({ ...e, default: false }))
      : [...this.config.entrypoints];
    this.commit(this.config.withEntrypoints([...others, entry]));
    return entry;
  }

  setDefault(name: string): void {
    this.get(name);
    this.commit(
      this.config.withEntrypoints(this.config.entrypoints.map((e) => ({ ...e, default: e.name === name }))),
    );
  }

  /** Every import and workdir problem, in entrypoint order. */
  collectIssues(projectRoot: string): EntrypointIssue[] {
    const root = path.resolve(projectRoot);
    const context = new ModuleResolutionContext(root);
    const issues: EntrypointIssue[] = [];

    for (const entry of this.config.entrypoints) {
      const importIssue = checkImport(entry, context);
      if (importIssue) issues.push(importIssue);

      if (entry.workdir) {
        const resolved = path.resolve(root, entry.workdir);
        const inside = resolved === root || resolved.startsWith(root + path.sep);
        if (!inside) {
          issues.push(new WorkdirMissingError(entry.name, `workdir escapes the project root: ${entry.workdir}`));
        } else if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
          issues.push(new WorkdirMissingError(entry.name, `workdir does not exist: ${resolved}`));
        }
      }
    }
    return issues;
  }

  /** Throws one EntrypointValidationError listing every failing entrypoint. */
  validateImportability(projectRoot: string): void {
    const issues = this.collectIssues(projectRoot);
    if (issues.length > 0) throw new EntrypointValidationError(issues);
  }

  private commit(next: ProjectConfig): void {
    if (this.configPath) {
      next.save(this.configPath);
      writeEntryPointIndex(next, path.dirname(this.configPath));
    }
    this.config = next;
  }
}

function checkImport(entry: Entrypoint, context: ModuleResolutionContext): ImportValidationError | null {
  const parsed = parseCommand(entry.command);
  if (!parsed) {
    return new ImportValidationError(entry.name, `command '${entry.command}' must be in 'module:function' format`);
  }

  const mod = context.resolveModule(parsed.module);
  if (!mod) {
    return new ImportValidationError(
      entry.name,
      `cannot import module '${parsed.module}' from project root '${context.importRoot}'`,
    );
  }

  if (!context.findAttribute(mod, parsed.func)) {
    return new ImportValidationError(entry.name, `function '${parsed.func}' not found in module '${parsed.module}'`);
  }
  return null;
}
