import { type Edge, edgeKey } from "./edge.js";
import type { VertexId } from "./vertex-id.js";

/**
 * In-memory directed graph.
 *
 * Vertices and edges are kept as independent sets: adding an edge does not
 * add its endpoints to the vertex set. Iteration follows insertion order.
 *
 * @example
 * ```typescript
 * const graph = new DirectedGraph();
 * graph.addVertex(14n);
 * graph.addEdge({ from: 14n, to: 15n });
 * graph.hasVertex(15n); // false
 * ```
 */
export class DirectedGraph {
  private readonly vertexSet = new Set<VertexId>();
  private readonly edgeMap = new Map<string, Edge>();

  get vertexCount(): number {
    return this.vertexSet.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  /**
   * @returns true if the vertex was not present before
   */
  addVertex(id: VertexId): boolean {
    if (this.vertexSet.has(id)) return false;
    this.vertexSet.add(id);
    return true;
  }

  hasVertex(id: VertexId): boolean {
    return this.vertexSet.has(id);
  }

  /**
   * Remove a vertex together with every edge starting or ending at it.
   *
   * Edges are removed even when the id is only an edge endpoint.
   *
   * @returns true if the graph changed
   */
  removeVertex(id: VertexId): boolean {
    let changed = this.vertexSet.delete(id);
    for (const [key, e] of this.edgeMap) {
      if (e.from === id || e.to === id) {
        this.edgeMap.delete(key);
        changed = true;
      }
    }
    return changed;
  }

  /**
   * @returns true if the edge was not present before
   */
  addEdge(e: Edge): boolean {
    const key = edgeKey(e);
    if (this.edgeMap.has(key)) return false;
    this.edgeMap.set(key, { from: e.from, to: e.to });
    return true;
  }

  hasEdge(e: Edge): boolean {
    return this.edgeMap.has(edgeKey(e));
  }

  /**
   * @returns true if the edge was present
   */
  removeEdge(e: Edge): boolean {
    return this.edgeMap.delete(edgeKey(e));
  }

  vertices(): IterableIterator<VertexId> {
    return this.vertexSet.values();
  }

  edges(): IterableIterator<Edge> {
    return this.edgeMap.values();
  }

  /**
   * Set equality of vertices and edges; iteration order is ignored.
   */
  equals(other: DirectedGraph): boolean {
    if (this.vertexCount !== other.vertexCount || this.edgeCount !== other.edgeCount) {
      return false;
    }
    for (const id of this.vertexSet) {
      if (!other.hasVertex(id)) return false;
    }
    for (const e of this.edgeMap.values()) {
      if (!other.hasEdge(e)) return false;
    }
    return true;
  }

  clone(): DirectedGraph {
    const copy = new DirectedGraph();
    for (const id of this.vertexSet) copy.addVertex(id);
    for (const e of this.edgeMap.values()) copy.addEdge(e);
    return copy;
  }
}
