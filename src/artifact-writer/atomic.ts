import fs from "node:fs";
import path from "node:path";

/** Sibling temp path; the write lands under the final name only via rename. */
export function tempPathFor(target: string): string {
  return `${target}.${process.pid}.tmp`;
}

/**
 * Write `content` to `target` through a temp file and an atomic rename.
 * Parent directories are created; the temp file never outlives a failure.
 */
export function atomicWriteFile(target: string, content: string | Uint8Array): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tmp = tempPathFor(target);
  try {
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, target);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    throw e;
  }
}

/** Copy `source` over `target` through a temp file and an atomic rename. */
export function atomicCopyFile(source: string, target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const tmp = tempPathFor(target);
  try {
    fs.copyFileSync(source, tmp);
    fs.renameSync(tmp, target);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    throw e;
  }
}
