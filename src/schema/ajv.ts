import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type SchemaValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type SchemaCompiler = {
  compile: (schema: unknown) => SchemaValidateFn;
  errorsText: (errors: unknown, opts?: { dataVar?: string; separator?: string }) => string;
};

/** ajv (draft 2020-12) with formats; `uri` is used for orchestrator URLs. */
export async function loadAjv(): Promise<SchemaCompiler> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): SchemaCompiler };
  const add = addFormats as unknown as (ajv: SchemaCompiler) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}
