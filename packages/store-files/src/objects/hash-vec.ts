import { Hash } from "../hash/index.js";
import type { HashAddressedKind } from "./object-kinds.js";

/**
 * Ordered list of hashes referencing objects of one kind.
 *
 * Only the hashes are persisted; the referenced kind tells readers where
 * to resolve them.
 */
export class HashVec<T> implements Iterable<Hash> {
  constructor(
    readonly kind: HashAddressedKind<T>,
    readonly hashes: readonly Hash[],
  ) {}

  get length(): number {
    return this.hashes.length;
  }

  /**
   * Copy with hashes in bytewise order, so that equal sets encode equally.
   */
  sorted(): HashVec<T> {
    return new HashVec(this.kind, [...this.hashes].sort(Hash.compare));
  }

  [Symbol.iterator](): Iterator<Hash> {
    return this.hashes[Symbol.iterator]();
  }
}
