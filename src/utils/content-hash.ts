import { createHash } from "node:crypto";

/**
 * Short content-identity tag: the first 8 hex characters of a SHA-1 digest
 * Used to name generated files, not for security
 *
 * @example
 * contentHash("hello\n") // "f572d396"
 */
export function contentHash(text: string): string {
  return createHash("sha1").update(text, "utf8").digest("hex").slice(0, 8);
}
