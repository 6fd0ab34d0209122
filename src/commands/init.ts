import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ProjectConfig, PROJECT_FILE } from "../project/config.js";
import { renderEntryPointIndex, ENTRY_POINTS_FILE } from "../entrypoints/index-file.js";
import { BINDINGS_ENTRY, PYPROJECT_ENTRY } from "../contract/rules.js";
import { DEFAULT_BUILDER_SETTINGS } from "../builder/builder.js";
import { ProjectExistsError } from "../errors.js";
import { failure, type Failure } from "./diagnostics.js";

export const TEMPLATE_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../templates");

export const INITIAL_VERSION = "0.0.0";

export type InitOpts = {
  projectRoot?: string;
  /** Defaults to the project directory's name. */
  name?: string;
  distDir?: string;
};

export type InitResult = { ok: true; configPath: string; created: string[] } | Failure;

function renderTemplate(file: string, vars: Record<string, string>): string {
  const text = fs.readFileSync(path.join(TEMPLATE_DIR, file), "utf8");
  return text.replace(/\{\{(\w+)\}\}/g, (whole, key: string) => vars[key] ?? whole);
}

/**
 * Scaffold a project: manifest, entry module, entrypoint index, bindings,
 * pyproject.toml and the dist directory. Whatever was created is removed
 * again if a later write fails.
 */
export async function initProject(opts: InitOpts = {}): Promise<InitResult> {
  const projectRoot = path.resolve(opts.projectRoot ?? ".");
  const configPath = path.join(projectRoot, PROJECT_FILE);
  const name = opts.name ?? path.basename(projectRoot);
  const created: string[] = [];

  try {
    if (fs.existsSync(configPath)) throw new ProjectExistsError(configPath);

    const config = ProjectConfig.create({
      name,
      version: INITIAL_VERSION,
      entrypoints: [{ name: "main", command: "main:main", default: true }],
    });

    // existing user files are left alone
    const files: Array<[string, () => string]> = [
      ["main.py", () => renderTemplate("main.py", { name })],
      [PYPROJECT_ENTRY, () => renderTemplate("pyproject.toml", { name })],
      [ENTRY_POINTS_FILE, () => renderEntryPointIndex(config)],
      [BINDINGS_ENTRY, () => "{}\n"],
    ];

    fs.mkdirSync(projectRoot, { recursive: true });
    for (const [file, render] of files) {
      const target = path.join(projectRoot, file);
      if (fs.existsSync(target)) continue;
      fs.writeFileSync(target, render(), { flag: "wx" });
      created.push(target);
    }

    const distDir = path.join(projectRoot, opts.distDir ?? DEFAULT_BUILDER_SETTINGS.distDir);
    if (!fs.existsSync(distDir)) {
      fs.mkdirSync(distDir);
      created.push(distDir);
    }

    config.save(configPath);
    created.push(configPath);
    return { ok: true, configPath, created };
  } catch (e) {
    for (const target of created.reverse()) fs.rmSync(target, { recursive: true, force: true });
    return failure(e);
  }
}
