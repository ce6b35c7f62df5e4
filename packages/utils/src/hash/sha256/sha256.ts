/**
 * SHA-256 hash function
 *
 * Backed by the Node.js crypto module. Synchronous, so that content
 * addresses can be derived while objects are encoded.
 */

import { createHash } from "node:crypto";

/** SHA-256 digest length in bytes */
export const SHA256_LENGTH = 32;

/**
 * Compute the SHA-256 digest of data
 *
 * @param data Data to hash
 * @returns 32-byte digest
 *
 * @example
 * ```typescript
 * const data = new TextEncoder().encode("hello");
 * const digest = sha256(data);
 * // digest is Uint8Array(32)
 * ```
 */
export function sha256(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(data).digest());
}
