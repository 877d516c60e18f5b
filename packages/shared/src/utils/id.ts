import { createHash, randomUUID as cryptoRandomUUID } from "node:crypto";

/**
 * Generate a random (version 4) UUID.
 */
export function randomUUID(): string {
  return cryptoRandomUUID();
}

/**
 * Generate a deterministic UUID from the given input.
 *
 * The input is hashed with SHA-256, and the lowercase hex digest is turned into
 * a name-based version 3 UUID (MD5, no namespace). The same input always yields
 * the same id, which lets stores deduplicate re-ingested content.
 *
 * @example
 * ```typescript
 * generateUUIDFrom("hello") === generateUUIDFrom("hello"); // true
 * ```
 */
export function generateUUIDFrom(input: string): string {
  const hex = createHash("sha256").update(input, "utf8").digest("hex");
  const bytes = createHash("md5").update(hex, "utf8").digest();

  // version 3
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x30;
  // IETF variant
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;

  const digits = bytes.toString("hex");
  return [
    digits.slice(0, 8),
    digits.slice(8, 12),
    digits.slice(12, 16),
    digits.slice(16, 20),
    digits.slice(20, 32),
  ].join("-");
}
