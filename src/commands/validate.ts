import path from "node:path";
import { ProjectConfig, PROJECT_FILE } from "../project/config.js";
import { EntrypointRegistry } from "../entrypoints/registry.js";
import { inspectPyproject } from "../project/pyproject.js";
import { PYPROJECT_ENTRY } from "../contract/rules.js";
import { diag, failure, type Diagnostic } from "./diagnostics.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type ValidateResult =
  | { ok: true; config: ProjectConfig; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[]; warnings: Diagnostic[]; exitCode: ExitCode };

/**
 * Validate bvproject.yaml, its version and every entrypoint target in one
 * pass, so all problems are reported together.
 */
export async function validateProject(opts: { configPath?: string; projectRoot?: string }): Promise<ValidateResult> {
  const configPath = path.resolve(opts.configPath ?? PROJECT_FILE);
  const projectRoot = path.resolve(opts.projectRoot ?? path.dirname(configPath));
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  let config: ProjectConfig;
  try {
    config = await ProjectConfig.load(configPath);
  } catch (e) {
    return { ...failure(e), warnings };
  }

  const semver = config.validateSemver();
  if (!semver.ok) {
    errors.push(diag("error", semver.error.code, semver.error.message, { path: configPath }));
  }

  const issues = new EntrypointRegistry(config, null).collectIssues(projectRoot);
  for (const issue of issues) {
    errors.push(
      diag("error", issue.code, issue.message, { details: { entrypoint: issue.entrypoint, reason: issue.reason } }),
    );
  }

  const pyprojectPath = path.join(projectRoot, PYPROJECT_ENTRY);
  const pyproject = inspectPyproject(pyprojectPath);
  if (!pyproject.exists) {
    warnings.push(diag("warn", "PYPROJECT_MISSING", `${PYPROJECT_ENTRY} not found; it is required to build`, { path: pyprojectPath }));
  } else if (pyproject.identityKeys.length > 0) {
    warnings.push(
      diag(
        "warn",
        "PYPROJECT_IDENTITY",
        `${PYPROJECT_ENTRY} declares ${pyproject.identityKeys.join(" and ")}; these belong in ${PROJECT_FILE}`,
        { path: pyprojectPath },
      ),
    );
  }

  if (errors.length > 0) {
    const exitCode = issues.length > 0 ? exitCodeFor("entrypoint") : exitCodeFor("version");
    return { ok: false, errors, warnings, exitCode };
  }
  return { ok: true, config, warnings };
}
