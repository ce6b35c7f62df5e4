/**
 * Content hash of a stored object
 *
 * A SHA-256 digest over the exact encoded bytes of an object. Equality is
 * byte comparison; the hex form is only used to build file names.
 */

import { bytesEqual, bytesToHex, compareBytes, hexToBytes, isHex, sha256 } from "@histograph/utils";
import { InvalidHashError } from "../errors.js";

/** Digest length in bytes */
export const HASH_LENGTH = 32;

/** Hex string length of a digest */
export const HASH_HEX_LENGTH = HASH_LENGTH * 2;

export class Hash {
  private readonly digest: Uint8Array;
  private hex?: string;

  private constructor(digest: Uint8Array) {
    this.digest = digest;
  }

  /**
   * Hash the exact given bytes.
   */
  static compute(content: Uint8Array): Hash {
    return new Hash(sha256(content));
  }

  /**
   * Wrap an existing 32-byte digest (copied).
   *
   * @throws InvalidHashError if the length is not 32 bytes
   */
  static fromBytes(bytes: Uint8Array): Hash {
    if (bytes.length !== HASH_LENGTH) {
      throw new InvalidHashError(`Expected ${HASH_LENGTH} bytes, got ${bytes.length}`);
    }
    return new Hash(bytes.slice());
  }

  /**
   * Parse a 64-character hex string.
   *
   * @throws InvalidHashError for any other input
   */
  static fromHex(text: string): Hash {
    if (text.length !== HASH_HEX_LENGTH || !isHex(text)) {
      throw new InvalidHashError(`Invalid hash: ${JSON.stringify(text)}`);
    }
    return new Hash(hexToBytes(text));
  }

  /**
   * Bytewise ordering, usable as an `Array.prototype.sort` comparator.
   */
  static compare(a: Hash, b: Hash): number {
    return compareBytes(a.digest, b.digest);
  }

  /** Copy of the raw digest */
  get bytes(): Uint8Array {
    return this.digest.slice();
  }

  equals(other: Hash): boolean {
    return bytesEqual(this.digest, other.digest);
  }

  /** 64 lowercase hex characters */
  toHex(): string {
    this.hex ??= bytesToHex(this.digest);
    return this.hex;
  }

  toString(): string {
    return this.toHex();
  }

  /**
   * Write the digest into a buffer at the given offset.
   */
  copyTo(target: Uint8Array, offset: number): void {
    target.set(this.digest, offset);
  }
}
