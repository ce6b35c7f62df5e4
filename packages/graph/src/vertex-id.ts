import { InvalidVertexIdError } from "./errors.js";

/**
 * Identity of a graph vertex: an unsigned 64-bit integer.
 */
export type VertexId = bigint;

/** Largest representable vertex id (2^64 - 1) */
export const MAX_VERTEX_ID: VertexId = 0xffff_ffff_ffff_ffffn;

const DECIMAL_PATTERN = /^\d+$/;

/**
 * Create a vertex id from a number, bigint or decimal string.
 *
 * @throws InvalidVertexIdError if the value is not an integer in 0..2^64-1
 */
export function vertexId(value: number | bigint | string): VertexId {
  let id: bigint;
  if (typeof value === "bigint") {
    id = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidVertexIdError(value);
    }
    id = BigInt(value);
  } else {
    const text = value.trim();
    if (!DECIMAL_PATTERN.test(text)) {
      throw new InvalidVertexIdError(value);
    }
    id = BigInt(text);
  }

  if (!isVertexId(id)) {
    throw new InvalidVertexIdError(value, `Vertex id out of range: ${String(value)}`);
  }
  return id;
}

/**
 * Check that a bigint lies in the vertex id range.
 */
export function isVertexId(value: bigint): boolean {
  return value >= 0n && value <= MAX_VERTEX_ID;
}
