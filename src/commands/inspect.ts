import path from "node:path";
import { validatePackage, type PackageContents } from "../contract/validator.js";
import { failure, type Failure } from "./diagnostics.js";

export type InspectResult = { ok: true; contents: PackageContents } | Failure;

/** Contract-check a package file, optionally against an expected name/version. */
export async function inspectPackage(opts: {
  packagePath: string;
  expectName?: string;
  expectVersion?: string;
}): Promise<InspectResult> {
  try {
    const contents = await validatePackage(path.resolve(opts.packagePath), {
      name: opts.expectName,
      version: opts.expectVersion,
    });
    return { ok: true, contents };
  } catch (e) {
    return failure(e);
  }
}
