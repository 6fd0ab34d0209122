/** Structural contract every package must satisfy. */

export const PROJECT_ENTRY = "bvproject.yaml";
export const ENTRY_POINTS_ENTRY = "entry-points.json";
export const PYPROJECT_ENTRY = "pyproject.toml";
export const BINDINGS_ENTRY = "bindings.json";

export const REQUIRED_ENTRIES = [PROJECT_ENTRY, ENTRY_POINTS_ENTRY, PYPROJECT_ENTRY] as const;

/** Path segments that may not appear anywhere in an archive path. */
export const FORBIDDEN_SEGMENTS: ReadonlySet<string> = new Set([".venv", "__pycache__", ".git", "dist"]);

export function splitSegments(archivePath: string): string[] {
  return archivePath.split(/[\\/]/).filter((s) => s.length > 0);
}

export function hasForbiddenSegment(archivePath: string): boolean {
  return splitSegments(archivePath).some((s) => FORBIDDEN_SEGMENTS.has(s));
}

/** Absolute, drive-qualified or `..`-climbing paths cannot be extracted safely. */
export function escapesRoot(archivePath: string): boolean {
  return (
    archivePath.startsWith("/") ||
    archivePath.startsWith("\\") ||
    /^[A-Za-z]:/.test(archivePath) ||
    splitSegments(archivePath).includes("..")
  );
}
