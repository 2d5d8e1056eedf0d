import { createHash } from "crypto";

/**
 * Generates a SHA-256 hash truncated to 16 characters for cache key derivation.
 */
export function hash(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/**
 * Replaces characters that are unsafe in file names.
 */
export function sanitizeForPath(value: string): string {
  return value.replace(/[^a-zA-Z0-9.-]/g, "_");
}
