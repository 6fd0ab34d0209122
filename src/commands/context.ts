import path from "node:path";
import { loadSettings } from "../config/loader.js";
import { DEFAULT_BUILDER_SETTINGS, PackageBuilder } from "../builder/builder.js";
import { FileLockProvider, PipFreezeLockProvider, type DependencyLockProvider } from "../lock/provider.js";
import type { BvpackSettings } from "../types/config.js";

export type CommandContextOptions = {
  /** Settings layer `config/<env>.yaml`. */
  env?: string;
  settingsDir?: string;
  lockFile?: string;
  /** Overrides the lock provider chosen from settings (tests, embedding). */
  lockProvider?: DependencyLockProvider;
};

export type CommandContext = {
  settings: BvpackSettings;
  builder: PackageBuilder;
};

/** `--lock-file`, then `lock_file` from settings, then `pip freeze` in the venv. */
function chooseLockProvider(settings: BvpackSettings, opts: CommandContextOptions): DependencyLockProvider {
  if (opts.lockProvider) return opts.lockProvider;
  const lockFile = opts.lockFile ?? settings.lock_file;
  if (lockFile) return new FileLockProvider(path.resolve(lockFile));
  return new PipFreezeLockProvider();
}

export async function createCommandContext(opts: CommandContextOptions = {}): Promise<CommandContext> {
  const settings = await loadSettings({ envName: opts.env, configDir: opts.settingsDir });
  const builder = new PackageBuilder(chooseLockProvider(settings, opts), {
    distDir: settings.dist_dir,
    artifactExtension: settings.artifact_extension,
    compressionLevel: settings.compression_level ?? DEFAULT_BUILDER_SETTINGS.compressionLevel,
    publishDir: settings.publish_dir,
    exclude: settings.exclude,
  });
  return { settings, builder };
}
