import { createHash } from "node:crypto";
import fs from "node:fs";

/** SHA-256 hex digest of a file on disk. */
export function computeSha256(filePath: string): string {
  return computeSha256FromContent(fs.readFileSync(filePath));
}

export function computeSha256FromContent(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
