import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { BvpackSettings } from "../types/config.js";
import { ConfigParseError, describeError } from "../errors.js";
import { assertSettings } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "BVPACK_";

type Layer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Layer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two layers. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Parsed YAML mapping, or an empty layer when the file does not exist. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigParseError(filePath, describeError(e), e);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new ConfigParseError(filePath, "root must be a mapping");
  return parsed;
}

/** BVPACK_PUBLISH_DIR → publish_dir; integer-looking values become numbers. */
function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv): Layer {
  const result: Layer = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = /^\d+$/.test(value) ? Number(value) : value;
  }
  return result;
}

export type LoadSettingsOptions = {
  /** Loads `<configDir>/<envName>.yaml` over the base layer. */
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/** Merge base.yaml ← <env>.yaml ← environment variables, without validation. */
export function mergeSettingsLayers(opts: LoadSettingsOptions = {}): Record<string, unknown> {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  return applyEnvOverrides(merged, opts.env ?? process.env);
}

/** Load layered settings and validate them against settings.schema.json. */
export async function loadSettings(opts: LoadSettingsOptions = {}): Promise<BvpackSettings> {
  return assertSettings(mergeSettingsLayers(opts));
}
