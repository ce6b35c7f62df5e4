import type { Edge, VertexId } from "@histograph/graph";
import { Hash } from "../hash/index.js";
import { VERTEX_KIND } from "./object-kinds.js";

/**
 * Stored form of an edge: the content hashes of its two endpoints.
 */
export interface HashEdge {
  readonly from: Hash;
  readonly to: Hash;
}

/**
 * Content hash of a vertex object, computed without reading the store.
 */
export function vertexHash(id: VertexId): Hash {
  return Hash.compute(VERTEX_KIND.encode(id));
}

export function toHashEdge(edge: Edge): HashEdge {
  return { from: vertexHash(edge.from), to: vertexHash(edge.to) };
}
