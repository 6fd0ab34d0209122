import type { ErrorCategory } from "../errors.js";

/**
 * CLI exit codes, one per failure category.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIG_INVALID: 2,
  VERSION_INVALID: 3,
  ENTRYPOINT_INVALID: 4,
  BUILD_FAILED: 5,
  CONTRACT_VIOLATION: 6,
  PUBLISH_REJECTED: 7,
  INVALID_ARGS: 64,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const BY_CATEGORY: Record<ErrorCategory, ExitCode> = {
  config: EXIT.CONFIG_INVALID,
  version: EXIT.VERSION_INVALID,
  entrypoint: EXIT.ENTRYPOINT_INVALID,
  build: EXIT.BUILD_FAILED,
  contract: EXIT.CONTRACT_VIOLATION,
  publish: EXIT.PUBLISH_REJECTED,
};

export function exitCodeFor(category: ErrorCategory | null): ExitCode {
  return category ? BY_CATEGORY[category] : EXIT.FAILURE;
}
