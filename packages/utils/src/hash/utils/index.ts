/**
 * Utility functions for hash operations
 */

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Check whether a string is an even-length hexadecimal string
 */
export function isHex(hex: string): boolean {
  return HEX_PATTERN.test(hex);
}

/**
 * Convert hex string to Uint8Array
 *
 * @param hex Hexadecimal string (e.g., "deadbeef")
 * @returns Uint8Array of bytes
 * @throws Error if the string has odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 *
 * @param bytes Uint8Array of bytes
 * @returns Hexadecimal string (lowercase)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Compare two byte arrays lexicographically
 *
 * @returns Negative if a < b, positive if a > b, zero if equal
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

/**
 * Check two byte arrays for equal content
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
