import path from "node:path";
import { PROJECT_FILE } from "../project/config.js";
import { PublishOrchestrator, type PublishResult } from "../publish/orchestrator.js";
import { BUMP_LEVELS, parseBumpLevel, type BumpLevel } from "../version/semver.js";
import { createCommandContext, type CommandContextOptions } from "./context.js";
import { diag, failure, type Failure } from "./diagnostics.js";
import { EXIT } from "./exit-codes.js";

export type PublishCommandOpts = CommandContextOptions & {
  configPath?: string;
  packagePath?: string;
  outputDir?: string;
  include?: string[];
  bump?: string;
  move?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
};

export type PublishCommandResult = ({ ok: true } & PublishResult) | Failure;

export type BumpFlags = Partial<Record<BumpLevel, boolean>>;

/** `--major`, `--minor` and `--patch` are mutually exclusive; none means patch. */
export function selectBumpLevel(flags: BumpFlags): { ok: true; level: BumpLevel } | Failure {
  const chosen = BUMP_LEVELS.filter((level) => flags[level] === true);
  if (chosen.length > 1) {
    return {
      ok: false,
      errors: [diag("error", "INVALID_ARGS", `Only one of ${chosen.map((l) => `--${l}`).join(", ")} may be given`)],
      exitCode: EXIT.INVALID_ARGS,
    };
  }
  return { ok: true, level: chosen[0] ?? "patch" };
}

export async function publishPackage(opts: PublishCommandOpts): Promise<PublishCommandResult> {
  try {
    const bump = parseBumpLevel(opts.bump);
    const { settings, builder } = await createCommandContext(opts);
    const configPath = path.resolve(opts.configPath ?? PROJECT_FILE);

    const orchestrator = new PublishOrchestrator(configPath, builder);
    const result = await orchestrator.publish({
      artifactPath: opts.packagePath,
      bump,
      move: opts.move,
      overwrite: opts.overwrite,
      dryRun: opts.dryRun,
      extraIncludes: opts.include,
      publishDir: opts.outputDir ?? path.resolve(path.dirname(configPath), settings.publish_dir),
    });
    return { ok: true, ...result };
  } catch (e) {
    return failure(e);
  }
}
