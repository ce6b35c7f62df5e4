/**
 * Transient pairing of encoded content, its hash and its kind.
 *
 * Built from a value before a write, or from bytes after a read. Only
 * `content` ever reaches the disk.
 */

import { GraphStorageError, HashMismatchError, SerializationError } from "../errors.js";
import { Hash } from "../hash/index.js";
import type { ObjectKind } from "./object-kinds.js";

export class ObjectFile<T, K extends ObjectKind<T> = ObjectKind<T>> {
  private constructor(
    readonly kind: K,
    readonly content: Uint8Array,
    readonly hash: Hash,
  ) {}

  /**
   * Encode a value and hash the result.
   *
   * @throws SerializationError if the value cannot be encoded
   */
  static fromValue<T, K extends ObjectKind<T>>(kind: K, value: T): ObjectFile<T, K> {
    const content = runCodec(kind, "encode", () => kind.encode(value));
    return new ObjectFile<T, K>(kind, content, Hash.compute(content));
  }

  /**
   * Wrap stored bytes.
   *
   * @param hash Address the content was read from; recomputed when omitted
   */
  static fromContent<T, K extends ObjectKind<T>>(
    kind: K,
    content: Uint8Array,
    hash?: Hash,
  ): ObjectFile<T, K> {
    return new ObjectFile<T, K>(kind, content, hash ?? Hash.compute(content));
  }

  /**
   * Check that the content hashes to the address it was read from.
   *
   * @throws HashMismatchError otherwise
   */
  verify(): this {
    const actual = Hash.compute(this.content);
    if (!actual.equals(this.hash)) {
      throw new HashMismatchError(this.kind.name, this.hash.toHex(), actual.toHex());
    }
    return this;
  }

  /**
   * @throws SerializationError if the content is not a valid encoding
   */
  decode(): T {
    return runCodec(this.kind, "decode", () => this.kind.decode(this.content));
  }
}

function runCodec<R>(kind: ObjectKind<unknown>, operation: string, fn: () => R): R {
  try {
    return fn();
  } catch (error) {
    if (error instanceof GraphStorageError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new SerializationError(kind.name, `${operation} failed: ${message}`, { cause: error });
  }
}
