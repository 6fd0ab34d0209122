import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";

export const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
export const SCHEMA_DIR = path.join(REPO_ROOT, "schemas");

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `bvpack-${prefix}-`));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export const DEMO_MANIFEST = `name: demo
version: 1.2.3
entrypoints:
  - name: main
    command: app.main:run
    default: true
  - name: worker
    command: app.jobs:work
    workdir: app
`;

/** A small project that builds and validates cleanly. */
export function writeDemoProject(root: string, manifest = DEMO_MANIFEST): string {
  writeFiles(root, {
    "bvproject.yaml": manifest,
    "pyproject.toml": '[project]\ndependencies = ["requests"]\n',
    "app/__init__.py": "",
    "app/main.py": "import sys\n\n\ndef run():\n    return 0\n",
    "app/jobs.py": "class Runner:\n    pass\n\n\nasync def work():\n    return None\n",
    "data/seed.txt": "seed\n",
    ".venv/lib/site.py": "x = 1\n",
    "app/__pycache__/main.cpython-312.pyc": "compiled",
  });
  return path.join(root, "bvproject.yaml");
}
