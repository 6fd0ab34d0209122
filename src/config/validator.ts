import { createRegistry } from "../schema/registry.js";
import type { BvpackSettings } from "../types/config.js";
import { SchemaError } from "../errors.js";

export type SettingsValidationResult = {
  valid: boolean;
  errors: string | null;
};

export async function validateSettings(settings: unknown): Promise<SettingsValidationResult> {
  const registry = await createRegistry();
  return registry.validate("settings", settings);
}

/** Validate and narrow loaded settings, failing with a SchemaError. */
export async function assertSettings(settings: unknown): Promise<BvpackSettings> {
  const { valid, errors } = await validateSettings(settings);
  if (!valid) throw new SchemaError(`Settings invalid: ${errors ?? "unknown error"}`, "SETTINGS_INVALID");
  return settings as BvpackSettings;
}
