/**
 * Binary object format
 *
 * Fixed-width, little-endian encoding shared by writer and reader:
 *
 * - u64: 8 bytes, unsigned, little-endian
 * - hash: 32 raw digest bytes
 * - hash list: u64 element count followed by the hashes
 *
 * Content hashes are computed over this exact output, so the layout must
 * never change for existing stores.
 */

import { SerializationError } from "../errors.js";
import { HASH_LENGTH, Hash } from "../hash/index.js";

const U64_LENGTH = 8;
const MAX_U64 = 0xffff_ffff_ffff_ffffn;

/**
 * Accumulates encoded fields into one byte array.
 */
export class BinaryWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  /**
   * @param kind Name of the encoded object kind, used in error messages
   */
  constructor(private readonly kind: string) {}

  writeU64(value: bigint): this {
    if (value < 0n || value > MAX_U64) {
      throw new SerializationError(this.kind, `${value} does not fit into u64`);
    }
    const chunk = new Uint8Array(U64_LENGTH);
    new DataView(chunk.buffer).setBigUint64(0, value, true);
    return this.push(chunk);
  }

  writeHash(hash: Hash): this {
    const chunk = new Uint8Array(HASH_LENGTH);
    hash.copyTo(chunk, 0);
    return this.push(chunk);
  }

  writeHashList(hashes: readonly Hash[]): this {
    this.writeU64(BigInt(hashes.length));
    for (const hash of hashes) {
      this.writeHash(hash);
    }
    return this;
  }

  toBytes(): Uint8Array {
    const result = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }

  private push(chunk: Uint8Array): this {
    this.chunks.push(chunk);
    this.length += chunk.length;
    return this;
  }
}

/**
 * Sequential reader over encoded content.
 *
 * Every read checks the remaining length; `finish()` rejects trailing bytes.
 */
export class BinaryReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(
    private readonly kind: string,
    private readonly content: Uint8Array,
  ) {
    this.view = new DataView(content.buffer, content.byteOffset, content.byteLength);
  }

  get remaining(): number {
    return this.content.length - this.offset;
  }

  readU64(): bigint {
    this.require(U64_LENGTH, "u64");
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += U64_LENGTH;
    return value;
  }

  readHash(): Hash {
    this.require(HASH_LENGTH, "hash");
    const hash = Hash.fromBytes(this.content.subarray(this.offset, this.offset + HASH_LENGTH));
    this.offset += HASH_LENGTH;
    return hash;
  }

  readHashList(): Hash[] {
    const count = this.readU64();
    if (count * BigInt(HASH_LENGTH) !== BigInt(this.remaining)) {
      throw new SerializationError(
        this.kind,
        `list of ${count} hashes does not match ${this.remaining} remaining bytes`,
      );
    }
    const hashes: Hash[] = [];
    for (let i = 0n; i < count; i++) {
      hashes.push(this.readHash());
    }
    return hashes;
  }

  finish(): void {
    if (this.remaining !== 0) {
      throw new SerializationError(this.kind, `${this.remaining} unexpected trailing bytes`);
    }
  }

  private require(length: number, field: string): void {
    if (this.remaining < length) {
      throw new SerializationError(
        this.kind,
        `truncated ${field} at offset ${this.offset} (${this.remaining} of ${length} bytes)`,
      );
    }
  }
}
