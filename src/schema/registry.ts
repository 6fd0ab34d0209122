import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type SchemaValidateFn, type SchemaCompiler } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: boolean; errors: string | null };

/**
 * Discovers `*.schema.json` files in a directory and compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, SchemaValidateFn>();
  private ajv: SchemaCompiler | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (!isJsonObject(schema)) {
        throw new Error(`Schema is not a JSON object: ${filePath}`);
      }

      // "bvproject.schema.json" → "bvproject"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** name → schema version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  async getValidator(name: string): Promise<SchemaValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.compiler();
    const validate = ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  async validate(name: string, data: unknown): Promise<SchemaCheck> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    const ajv = await this.compiler();

    return {
      valid,
      errors: valid ? null : ajv.errorsText(validate.errors, { dataVar: name }),
    };
  }

  private async compiler(): Promise<SchemaCompiler> {
    if (!this.ajv) this.ajv = await loadAjv();
    return this.ajv;
  }
}

/** Schema version from an explicit `version` field or a `...@x.y.z` suffix on `$id`. */
function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.version === "string") return schema.version;

  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }

  return null;
}

const registries = new Map<string, Promise<SchemaRegistry>>();

/** Load (once per directory) the registry for the bundled schemas or `schemaDir`. */
export function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const dir = path.resolve(schemaDir ?? DEFAULT_SCHEMA_DIR);
  let pending = registries.get(dir);
  if (!pending) {
    const registry = new SchemaRegistry(dir);
    pending = registry.load().then(
      () => registry,
      (err: unknown) => {
        // a failed load must not be cached
        registries.delete(dir);
        throw err;
      },
    );
    registries.set(dir, pending);
  }
  return pending;
}
