import fs from "node:fs";
import path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { LockProviderError, describeError } from "../errors.js";

const pExecFile = promisify(execFile);

export const LOCK_FILE = "requirements.lock";

/**
 * Supplies the resolved dependency list embedded as `requirements.lock`.
 * The environment itself is managed elsewhere; this is read-only.
 */
export interface DependencyLockProvider {
  /** Ordered `package==version` lines. */
  freeze(venvDir: string): Promise<string[]>;
}

/** Runs `pip freeze` with the virtual environment's own interpreter. */
export class PipFreezeLockProvider implements DependencyLockProvider {
  constructor(private readonly timeoutMs = 120_000) {}

  async freeze(venvDir: string): Promise<string[]> {
    const python =
      process.platform === "win32"
        ? path.join(venvDir, "Scripts", "python.exe")
        : path.join(venvDir, "bin", "python");
    if (!fs.existsSync(python)) {
      throw new LockProviderError(
        `Virtual environment not found at ${venvDir} (no interpreter at ${python}); create it before building`,
      );
    }

    try {
      const { stdout } = await pExecFile(python, ["-m", "pip", "freeze"], { timeout: this.timeoutMs });
      return splitLockLines(stdout);
    } catch (e) {
      throw new LockProviderError(`pip freeze failed in ${venvDir}: ${describeError(e)}`, e);
    }
  }
}

/** Reads an existing lock file instead of touching an environment. */
export class FileLockProvider implements DependencyLockProvider {
  constructor(private readonly lockPath: string) {}

  async freeze(): Promise<string[]> {
    if (!fs.existsSync(this.lockPath)) {
      throw new LockProviderError(`Lock file not found: ${this.lockPath}`);
    }
    return splitLockLines(fs.readFileSync(this.lockPath, "utf8"));
  }
}

/** Fixed list; used where the lock is already known. */
export class StaticLockProvider implements DependencyLockProvider {
  constructor(private readonly lines: readonly string[]) {}

  async freeze(): Promise<string[]> {
    return [...this.lines];
  }
}

export function splitLockLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith("#"));
}

export function renderLockFile(lines: readonly string[]): string {
  return lines.length === 0 ? "" : lines.join("\n") + "\n";
}
