/**
 * Graph snapshot storage
 *
 * A graph is stored as a tree of hash-linked objects:
 *
 * ```
 * graph/<name>        -> GraphHash { vertexVecHash, edgeVecHash }
 * vertexvec/<hex>     -> hashes of vertex objects
 * edgevec/<hex>       -> hashes of edge objects
 * vertex/<hex>        -> vertex id
 * edge/<hex>          -> HashEdge { from, to } (endpoint vertex hashes)
 * ```
 *
 * Only the named pointer under `graph/` is ever rewritten with different
 * content; every other file is immutable once written.
 *
 * @example
 * ```typescript
 * const files = createNodeFilesApi();
 * const location = { files, basePath: "/var/lib/graphs" };
 *
 * await saveGraphAs(location, "current", graph);
 * const loaded = await loadGraph(location, "current");
 * ```
 */

import { DirectedGraph, type Edge, type VertexId } from "@histograph/graph";
import type { Hash } from "./hash/index.js";
import {
  EDGE_KIND,
  EDGE_VEC_KIND,
  GRAPH_KIND,
  type GraphHash,
  type HashEdge,
  type HashVec,
  VERTEX_KIND,
  VERTEX_VEC_KIND,
  toHashEdge,
} from "./objects/index.js";
import {
  hasNamedObject,
  readAllObjects,
  readNamedObject,
  readObject,
  writeAllObjects,
  writeNamedObject,
  writeObject,
} from "./object-storage.js";
import type { GraphStorageOptions, StorageLocation } from "./options.js";

/**
 * Write all vertices and the vertex list.
 *
 * @returns Hash of the vertex list
 */
export async function writeGraphVertices(
  location: StorageLocation,
  graph: DirectedGraph,
  options: GraphStorageOptions = {},
): Promise<Hash> {
  const hashVec = await writeAllObjects(location, VERTEX_KIND, graph.vertices(), options);
  return writeObject(location, VERTEX_VEC_KIND, order(hashVec, options));
}

/**
 * Write all edges and the edge list.
 *
 * Endpoint vertex objects are written alongside the edges, so that every
 * stored edge resolves on load even when an endpoint is not in the vertex
 * set. They are reported to `onProgress` as a separate vertex batch. The edge hashes themselves depend only on the endpoint ids.
 *
 * @returns Hash of the edge list
 */
export async function writeGraphEdges(
  location: StorageLocation,
  graph: DirectedGraph,
  options: GraphStorageOptions = {},
): Promise<Hash> {
  const edges = [...graph.edges()];
  const [hashVec] = await Promise.all([
    writeAllObjects(location, EDGE_KIND, edges.map(toHashEdge), options),
    writeAllObjects(location, VERTEX_KIND, endpointsOf(edges), options),
  ]);
  return writeObject(location, EDGE_VEC_KIND, order(hashVec, options));
}

/**
 * Write a graph without naming it. Vertices and edges are written
 * concurrently.
 */
export async function writeGraph(
  location: StorageLocation,
  graph: DirectedGraph,
  options: GraphStorageOptions = {},
): Promise<GraphHash> {
  const [vertexVecHash, edgeVecHash] = await Promise.all([
    writeGraphVertices(location, graph, options),
    writeGraphEdges(location, graph, options),
  ]);
  return { vertexVecHash, edgeVecHash };
}

/**
 * Save a graph and point the snapshot `name` at it, replacing whatever the
 * name pointed at before.
 *
 * A failed save may leave some objects on disk; they are content-addressed,
 * so repeating the same save is safe.
 */
export async function saveGraphAs(
  location: StorageLocation,
  name: string,
  graph: DirectedGraph,
  options: GraphStorageOptions = {},
): Promise<GraphHash> {
  const graphHash = await writeGraph(location, graph, options);
  await writeNamedObject(location, GRAPH_KIND, name, graphHash);
  return graphHash;
}

/**
 * Read the vertex list and every vertex it references.
 */
export async function readGraphVertices(
  location: StorageLocation,
  vertexVecHash: Hash,
  options: GraphStorageOptions = {},
): Promise<VertexId[]> {
  const hashVec = await readObject(location, VERTEX_VEC_KIND, vertexVecHash, options);
  return readAllObjects(location, VERTEX_KIND, hashVec, options);
}

/**
 * Read one edge and resolve both endpoints.
 */
export async function readEdge(
  location: StorageLocation,
  hash: Hash,
  options: GraphStorageOptions = {},
): Promise<Edge> {
  const hashEdge: HashEdge = await readObject(location, EDGE_KIND, hash, options);
  const [from, to] = await Promise.all([
    readObject(location, VERTEX_KIND, hashEdge.from, options),
    readObject(location, VERTEX_KIND, hashEdge.to, options),
  ]);
  return { from, to };
}

/**
 * Read the edge list and every edge it references.
 */
export async function readGraphEdges(
  location: StorageLocation,
  edgeVecHash: Hash,
  options: GraphStorageOptions = {},
): Promise<Edge[]> {
  const { onProgress } = options;
  const hashVec = await readObject(location, EDGE_VEC_KIND, edgeVecHash, options);

  let current = 0;
  return Promise.all(
    hashVec.hashes.map(async (hash) => {
      const edge = await readEdge(location, hash, options);
      onProgress?.({
        stage: "read",
        kind: EDGE_KIND.name,
        current: ++current,
        total: hashVec.length,
      });
      return edge;
    }),
  );
}

/**
 * Rebuild a graph from its root. The graph is only assembled once every
 * object has been read, so a failure never yields a partial graph.
 */
export async function readGraph(
  location: StorageLocation,
  graphHash: GraphHash,
  options: GraphStorageOptions = {},
): Promise<DirectedGraph> {
  const [vertices, edges] = await Promise.all([
    readGraphVertices(location, graphHash.vertexVecHash, options),
    readGraphEdges(location, graphHash.edgeVecHash, options),
  ]);

  const graph = new DirectedGraph();
  for (const id of vertices) {
    graph.addVertex(id);
  }
  for (const edge of edges) {
    graph.addEdge(edge);
  }
  return graph;
}

/**
 * Read the root a snapshot name points at.
 *
 * @throws ObjectNotFoundError if the snapshot was never saved
 */
export async function readSnapshotPointer(
  location: StorageLocation,
  name: string,
): Promise<GraphHash> {
  return readNamedObject(location, GRAPH_KIND, name);
}

export async function hasSnapshot(location: StorageLocation, name: string): Promise<boolean> {
  return hasNamedObject(location, GRAPH_KIND, name);
}

/**
 * Load the graph a snapshot name points at.
 *
 * @throws ObjectNotFoundError if the snapshot or any object it references
 * is missing
 * @throws SerializationError if any of those objects is corrupt
 */
export async function loadGraph(
  location: StorageLocation,
  name: string,
  options: GraphStorageOptions = {},
): Promise<DirectedGraph> {
  const graphHash = await readSnapshotPointer(location, name);
  return readGraph(location, graphHash, options);
}

function order<T>(hashVec: HashVec<T>, options: GraphStorageOptions): HashVec<T> {
  return options.canonicalOrder ? hashVec.sorted() : hashVec;
}

function endpointsOf(edges: readonly Edge[]): VertexId[] {
  const endpoints = new Set<VertexId>();
  for (const edge of edges) {
    endpoints.add(edge.from);
    endpoints.add(edge.to);
  }
  return [...endpoints];
}
