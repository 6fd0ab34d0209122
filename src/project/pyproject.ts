import fs from "node:fs";

/** Keys that belong in bvproject.yaml, not in the dependency manifest. */
const IDENTITY_KEYS = ["name", "version"] as const;

/**
 * Identity keys declared in the `[project]` table of a pyproject.toml.
 * A line scan is enough here; the file is otherwise opaque to this tool.
 */
export function findIdentityKeys(text: string): string[] {
  const found: string[] = [];
  let table: string | null = null;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    const header = /^\[\s*([^\]]+?)\s*\]$/.exec(line);
    if (header) {
      table = header[1];
      continue;
    }
    if (table !== "project") continue;
    for (const key of IDENTITY_KEYS) {
      if (new RegExp(`^${key}\\s*=`).test(line) && !found.includes(key)) found.push(key);
    }
  }
  return found;
}

export function inspectPyproject(filePath: string): { exists: boolean; identityKeys: string[] } {
  if (!fs.existsSync(filePath)) return { exists: false, identityKeys: [] };
  return { exists: true, identityKeys: findIdentityKeys(fs.readFileSync(filePath, "utf8")) };
}
