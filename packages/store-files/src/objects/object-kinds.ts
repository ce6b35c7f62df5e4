/**
 * Object kind registry
 *
 * Every storable kind declares the subdirectory its files live in and the
 * codec for its content. Kinds are either hash-addressed (file name is the
 * content hash) or named (file name is chosen by the caller). Only the graph
 * root is named, so the two file name families never share a directory.
 */

import type { VertexId } from "@histograph/graph";
import { ObjectKindError } from "../errors.js";
import { BinaryReader, BinaryWriter } from "../format/index.js";
import type { GraphHash } from "./graph-hash.js";
import type { HashEdge } from "./hash-edge.js";
import { HashVec } from "./hash-vec.js";

export type Addressing = "hash" | "named";

export interface ObjectKind<T, A extends Addressing = Addressing> {
  /** Subdirectory name under the storage base path */
  readonly name: string;
  readonly addressing: A;
  encode(value: T): Uint8Array;
  decode(content: Uint8Array): T;
}

export type HashAddressedKind<T> = ObjectKind<T, "hash">;

export type NamedObjectKind<T> = ObjectKind<T, "named">;

const KIND_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

const registry = new Map<string, ObjectKind<unknown>>();

/**
 * Register a kind under its subdirectory name.
 *
 * @throws ObjectKindError if the name is malformed or already taken
 */
export function defineObjectKind<T, A extends Addressing>(kind: ObjectKind<T, A>): ObjectKind<T, A> {
  if (!KIND_NAME_PATTERN.test(kind.name)) {
    throw new ObjectKindError(`Invalid object kind name: ${JSON.stringify(kind.name)}`);
  }
  if (registry.has(kind.name)) {
    throw new ObjectKindError(`Object kind already registered: ${kind.name}`);
  }
  registry.set(kind.name, kind);
  return kind;
}

/**
 * @throws ObjectKindError for unknown names
 */
export function getObjectKind(name: string): ObjectKind<unknown> {
  const kind = registry.get(name);
  if (!kind) {
    throw new ObjectKindError(`Unknown object kind: ${name}`);
  }
  return kind;
}

export function listObjectKinds(): ObjectKind<unknown>[] {
  return [...registry.values()];
}

export function isHashAddressed<T>(kind: ObjectKind<T>): kind is HashAddressedKind<T> {
  return kind.addressing === "hash";
}

export function isNamed<T>(kind: ObjectKind<T>): kind is NamedObjectKind<T> {
  return kind.addressing === "named";
}

export const VERTEX_KIND: HashAddressedKind<VertexId> = defineObjectKind({
  name: "vertex",
  addressing: "hash",
  encode: (id: VertexId) => new BinaryWriter("vertex").writeU64(id).toBytes(),
  decode: (content: Uint8Array) => {
    const reader = new BinaryReader("vertex", content);
    const id = reader.readU64();
    reader.finish();
    return id;
  },
});

export const EDGE_KIND: HashAddressedKind<HashEdge> = defineObjectKind({
  name: "edge",
  addressing: "hash",
  encode: (edge: HashEdge) =>
    new BinaryWriter("edge").writeHash(edge.from).writeHash(edge.to).toBytes(),
  decode: (content: Uint8Array) => {
    const reader = new BinaryReader("edge", content);
    const from = reader.readHash();
    const to = reader.readHash();
    reader.finish();
    return { from, to };
  },
});

export const VERTEX_VEC_KIND: HashAddressedKind<HashVec<VertexId>> = defineObjectKind({
  name: "vertexvec",
  addressing: "hash",
  encode: (vec: HashVec<VertexId>) =>
    new BinaryWriter("vertexvec").writeHashList(vec.hashes).toBytes(),
  decode: (content: Uint8Array) => {
    const reader = new BinaryReader("vertexvec", content);
    const hashes = reader.readHashList();
    reader.finish();
    return new HashVec(VERTEX_KIND, hashes);
  },
});

export const EDGE_VEC_KIND: HashAddressedKind<HashVec<HashEdge>> = defineObjectKind({
  name: "edgevec",
  addressing: "hash",
  encode: (vec: HashVec<HashEdge>) => new BinaryWriter("edgevec").writeHashList(vec.hashes).toBytes(),
  decode: (content: Uint8Array) => {
    const reader = new BinaryReader("edgevec", content);
    const hashes = reader.readHashList();
    reader.finish();
    return new HashVec(EDGE_KIND, hashes);
  },
});

export const GRAPH_KIND: NamedObjectKind<GraphHash> = defineObjectKind({
  name: "graph",
  addressing: "named",
  encode: (graphHash: GraphHash) =>
    new BinaryWriter("graph")
      .writeHash(graphHash.vertexVecHash)
      .writeHash(graphHash.edgeVecHash)
      .toBytes(),
  decode: (content: Uint8Array) => {
    const reader = new BinaryReader("graph", content);
    const vertexVecHash = reader.readHash();
    const edgeVecHash = reader.readHash();
    reader.finish();
    return { vertexVecHash, edgeVecHash };
  },
});
