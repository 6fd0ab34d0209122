import path from "node:path";
import { PROJECT_FILE, type Entrypoint } from "../project/config.js";
import { EntrypointRegistry } from "../entrypoints/registry.js";
import { failure, type Failure } from "./diagnostics.js";

export type EntryListResult = { ok: true; entrypoints: readonly Entrypoint[] } | Failure;
export type EntryAddResult = { ok: true; entrypoint: Entrypoint; defaultName: string } | Failure;
export type EntrySetDefaultResult = { ok: true; defaultName: string } | Failure;

function configPathOf(configPath?: string): string {
  return path.resolve(configPath ?? PROJECT_FILE);
}

export async function listEntrypoints(opts: { configPath?: string }): Promise<EntryListResult> {
  try {
    const registry = await EntrypointRegistry.open(configPathOf(opts.configPath));
    return { ok: true, entrypoints: registry.list() };
  } catch (e) {
    return failure(e);
  }
}

export async function addEntrypoint(opts: {
  configPath?: string;
  name: string;
  command: string;
  workdir?: string;
  setDefault?: boolean;
}): Promise<EntryAddResult> {
  try {
    const registry = await EntrypointRegistry.open(configPathOf(opts.configPath));
    const entrypoint = registry.add(opts.name, opts.command, opts.workdir, opts.setDefault ?? false);
    return { ok: true, entrypoint, defaultName: registry.current.defaultEntrypoint.name };
  } catch (e) {
    return failure(e);
  }
}

export async function setDefaultEntrypoint(opts: { configPath?: string; name: string }): Promise<EntrySetDefaultResult> {
  try {
    const registry = await EntrypointRegistry.open(configPathOf(opts.configPath));
    registry.setDefault(opts.name);
    return { ok: true, defaultName: opts.name };
  } catch (e) {
    return failure(e);
  }
}
