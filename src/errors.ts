/**
 * Error taxonomy. Every failure carries a stable `code` (used in jsonl output)
 * and a `category` that selects the process exit code.
 */
export type ErrorCategory = "config" | "version" | "entrypoint" | "build" | "contract" | "publish";

export abstract class BvpackError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// --- config ---

export class ConfigError extends BvpackError {
  readonly category = "config" as const;
}

export class ConfigNotFoundError extends ConfigError {
  constructor(readonly path: string) {
    super("CONFIG_NOT_FOUND", `Config not found at ${path}`);
  }
}

export class ConfigParseError extends ConfigError {
  constructor(readonly path: string, detail: string, cause?: unknown) {
    super("CONFIG_PARSE_FAILED", `Failed to parse config (${path}): ${detail}`, { cause });
  }
}

export class SchemaError extends ConfigError {
  constructor(message: string, code = "CONFIG_SCHEMA_INVALID") {
    super(code, message);
  }
}

export class NoEntrypointsError extends SchemaError {
  constructor() {
    super("project.entrypoints must include at least one entrypoint", "CONFIG_NO_ENTRYPOINTS");
  }
}

export class DefaultEntrypointError extends SchemaError {
  constructor(readonly defaultCount: number) {
    super(
      defaultCount === 0
        ? "one entrypoint must be marked default"
        : `only one entrypoint may be marked default (found ${defaultCount})`,
      "CONFIG_DEFAULT_ENTRYPOINT",
    );
  }
}

export class ProjectExistsError extends ConfigError {
  constructor(readonly path: string) {
    super("CONFIG_EXISTS", `Project already initialised: ${path} exists`);
  }
}

// --- version ---

export class VersionError extends BvpackError {
  readonly category = "version" as const;
}

export class FormatError extends VersionError {
  constructor(readonly text: string, reason?: string) {
    super(
      "VERSION_FORMAT",
      `Invalid SemVer '${text}'${reason ? `: ${reason}` : ""} (expected MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD])`,
    );
  }
}

export class InvalidBumpLevelError extends VersionError {
  constructor(readonly level: string) {
    super("VERSION_BUMP_LEVEL", `Bump level must be one of: major, minor, patch (got '${level}')`);
  }
}

// --- entrypoints ---

export class EntrypointError extends BvpackError {
  readonly category = "entrypoint" as const;
}

export class DuplicateNameError extends EntrypointError {
  constructor(readonly entrypoint: string) {
    super("ENTRYPOINT_DUPLICATE", `Entrypoint '${entrypoint}' already exists`);
  }
}

export class NotFoundError extends EntrypointError {
  constructor(readonly entrypoint: string) {
    super("ENTRYPOINT_NOT_FOUND", `Entrypoint '${entrypoint}' not found`);
  }
}

export class InvalidCommandError extends EntrypointError {
  constructor(readonly entrypoint: string, readonly command: string) {
    super(
      "ENTRYPOINT_COMMAND_INVALID",
      `Entrypoint '${entrypoint}' command '${command}' must be in 'module:function' format`,
    );
  }
}

export class ImportValidationError extends EntrypointError {
  constructor(readonly entrypoint: string, readonly reason: string) {
    super("ENTRYPOINT_IMPORT_FAILED", `Entrypoint '${entrypoint}': ${reason}`);
  }
}

export class WorkdirMissingError extends EntrypointError {
  constructor(readonly entrypoint: string, readonly reason: string) {
    super("ENTRYPOINT_WORKDIR_MISSING", `Entrypoint '${entrypoint}': ${reason}`);
  }
}

export type EntrypointIssue = ImportValidationError | WorkdirMissingError;

/** Batch of entrypoint issues; raised once after every entrypoint was checked. */
export class EntrypointValidationError extends EntrypointError {
  constructor(readonly issues: readonly EntrypointIssue[]) {
    super(
      "ENTRYPOINTS_INVALID",
      `Entrypoints invalid: ${issues.map((i) => i.message).join("; ")}`,
    );
  }
}

// --- build ---

export class BuildError extends BvpackError {
  readonly category = "build" as const;
}

export class IncludeNotFoundError extends BuildError {
  constructor(readonly include: string, reason = "does not exist") {
    super("BUILD_INCLUDE_NOT_FOUND", `Include path '${include}' ${reason}`);
  }
}

export class ArchiveWriteError extends BuildError {
  constructor(readonly path: string, cause: unknown) {
    super("BUILD_WRITE_FAILED", `Failed to write package ${path}: ${describeError(cause)}`, { cause });
  }
}

export class LockProviderError extends BuildError {
  constructor(message: string, cause?: unknown) {
    super("BUILD_LOCK_FAILED", message, { cause });
  }
}

// --- contract ---

export class ContractError extends BvpackError {
  readonly category = "contract" as const;
}

export class ArtifactNotFoundError extends ContractError {
  constructor(readonly path: string) {
    super("CONTRACT_ARTIFACT_NOT_FOUND", `Package not found: ${path}`);
  }
}

export class InvalidArchiveError extends ContractError {
  constructor(detail: string, cause?: unknown) {
    super("CONTRACT_ARCHIVE_INVALID", `Invalid package archive: ${detail}`, { cause });
  }
}

export class MissingRequiredFileError extends ContractError {
  constructor(readonly file: string) {
    super("CONTRACT_MISSING_FILE", `Package is missing required file: ${file}`);
  }
}

export class ForbiddenContentError extends ContractError {
  constructor(readonly path: string, reason = "contains a forbidden path segment") {
    super("CONTRACT_FORBIDDEN_CONTENT", `Package entry '${path}' ${reason}`);
  }
}

export class ManifestInvalidError extends ContractError {
  constructor(detail: string) {
    super("CONTRACT_MANIFEST_INVALID", `Package manifest invalid: ${detail}`);
  }
}

export class NameMismatchError extends ContractError {
  constructor(readonly expected: string, readonly actual: string) {
    super("CONTRACT_NAME_MISMATCH", `Package name mismatch: expected '${expected}', found '${actual}'`);
  }
}

export class VersionMismatchError extends ContractError {
  constructor(readonly expected: string, readonly actual: string) {
    super("CONTRACT_VERSION_MISMATCH", `Package version mismatch: expected '${expected}', found '${actual}'`);
  }
}

export class IntegrityError extends ContractError {
  constructor(readonly path: string, detail: string) {
    super("CONTRACT_INTEGRITY", `Package integrity check failed (${path}): ${detail}`);
  }
}

// --- publish ---

export class PublishError extends BvpackError {
  readonly category = "publish" as const;
}

export class ArtifactExistsError extends PublishError {
  constructor(readonly destination: string) {
    super(
      "PUBLISH_ARTIFACT_EXISTS",
      `Published artifact already exists: ${destination}. Use --overwrite to replace.`,
    );
  }
}

export class SourceArtifactMissingError extends PublishError {
  constructor(readonly path: string) {
    super("PUBLISH_SOURCE_MISSING", `Package not found at ${path}`);
  }
}

export class InvalidTransitionError extends PublishError {
  constructor(from: string, event: string) {
    super("PUBLISH_INVALID_TRANSITION", `Publish cannot apply '${event}' in state '${from}'`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
