import type { Hash } from "../hash/index.js";

/**
 * Root of a stored graph snapshot.
 */
export interface GraphHash {
  /** Hash of the vertex HashVec */
  readonly vertexVecHash: Hash;
  /** Hash of the edge HashVec */
  readonly edgeVecHash: Hash;
}

export function graphHashEquals(a: GraphHash, b: GraphHash): boolean {
  return a.vertexVecHash.equals(b.vertexVecHash) && a.edgeVecHash.equals(b.edgeVecHash);
}
