import { readFile } from "fs/promises";
import { basename, extname } from "path";
import { hash, sanitizeForPath } from "../utils/hash.js";

/**
 * Cache identity of a document: its readable file stem plus a content hash,
 * so same-named files from different folders never share cache entries.
 */
export async function deriveIdentityKey(filePath: string): Promise<string> {
  const content = await readFile(filePath);
  return identityKeyFor(filePath, content);
}

export function identityKeyFor(filePath: string, content: Buffer): string {
  const stem = basename(filePath, extname(filePath));
  return `${sanitizeForPath(stem)}-${hash(content)}`;
}
