export * from "./errors.js";
export { Version, BUMP_LEVELS, isBumpLevel, parseBumpLevel, type BumpLevel, type Ordering } from "./version/semver.js";
export { ProjectConfig, PROJECT_FILE, DEFAULT_VENV_DIR, type Entrypoint, type SemverCheck } from "./project/config.js";
export { EntrypointRegistry, parseCommand, COMMAND_PATTERN } from "./entrypoints/registry.js";
export { ModuleResolutionContext } from "./entrypoints/resolver.js";
export { buildEntryPointIndex, ENTRY_POINTS_FILE } from "./entrypoints/index-file.js";
export { PackageBuilder, DEFAULT_BUILDER_SETTINGS, type BuilderSettings, type BuildResult } from "./builder/builder.js";
export {
  PipFreezeLockProvider,
  FileLockProvider,
  StaticLockProvider,
  type DependencyLockProvider,
} from "./lock/provider.js";
export {
  PackageContractValidator,
  validateArchive,
  validatePackage,
  type PackageContents,
  type ExpectedIdentity,
} from "./contract/validator.js";
export { PublishOrchestrator, type PublishOptions, type PublishResult } from "./publish/orchestrator.js";
export { nextState, PUBLISH_STATES, type PublishState, type PublishEvent } from "./publish/state-machine.js";
export { loadSettings } from "./config/loader.js";
export type { BvpackSettings } from "./types/config.js";
