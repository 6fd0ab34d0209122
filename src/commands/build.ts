import path from "node:path";
import { PROJECT_FILE } from "../project/config.js";
import { createCommandContext, type CommandContextOptions } from "./context.js";
import { failure, type Diagnostic, type Failure } from "./diagnostics.js";
import { validateProject } from "./validate.js";

export type BuildCommandOpts = CommandContextOptions & {
  configPath?: string;
  output?: string;
  include?: string[];
  dryRun?: boolean;
};

export type BuildCommandResult =
  | { ok: true; artifactPath: string; written: boolean; sha256?: string; warnings: Diagnostic[] }
  | (Failure & { warnings?: Diagnostic[] });

/**
 * Validate the project, then build its package. The manifest's version is
 * left as it is.
 */
export async function buildPackage(opts: BuildCommandOpts): Promise<BuildCommandResult> {
  const configPath = path.resolve(opts.configPath ?? PROJECT_FILE);
  const projectRoot = path.dirname(configPath);

  const validation = await validateProject({ configPath, projectRoot });
  if (!validation.ok) return validation;

  try {
    const { builder } = await createCommandContext(opts);
    const result = await builder.build(validation.config, projectRoot, opts.include ?? [], {
      outputPath: opts.output,
      dryRun: opts.dryRun,
    });
    return {
      ok: true,
      artifactPath: result.artifactPath,
      written: result.written,
      sha256: result.sha256,
      warnings: validation.warnings,
    };
  } catch (e) {
    return { ...failure(e), warnings: validation.warnings };
  }
}
