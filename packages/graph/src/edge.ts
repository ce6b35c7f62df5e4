import type { VertexId } from "./vertex-id.js";

/**
 * Directed edge between two vertices.
 */
export interface Edge {
  readonly from: VertexId;
  readonly to: VertexId;
}

export function edge(from: VertexId, to: VertexId): Edge {
  return { from, to };
}

/**
 * Stable key of an edge, used to keep edges in a set.
 */
export function edgeKey(e: Edge): string {
  return `${e.from}->${e.to}`;
}
