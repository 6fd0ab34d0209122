import { BvpackError, EntrypointValidationError, describeError } from "../errors.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type Failure = { ok: false; errors: Diagnostic[]; exitCode: ExitCode };

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** One diagnostic per failure; an entrypoint batch expands to one per entrypoint. */
export function diagnosticsFromError(err: unknown): Diagnostic[] {
  if (err instanceof EntrypointValidationError) {
    return err.issues.map((issue) =>
      diag("error", issue.code, issue.message, { details: { entrypoint: issue.entrypoint, reason: issue.reason } }),
    );
  }
  if (err instanceof BvpackError) {
    return [diag("error", err.code, err.message, { details: { category: err.category } })];
  }
  return [diag("error", "UNEXPECTED", describeError(err))];
}

/** Failure result for a thrown error; unknown errors keep exit code 1. */
export function failure(err: unknown): Failure {
  return {
    ok: false,
    errors: diagnosticsFromError(err),
    exitCode: exitCodeFor(err instanceof BvpackError ? err.category : null),
  };
}
