export * from "./graph-hash.js";
export * from "./hash-edge.js";
export * from "./hash-vec.js";
export * from "./object-file.js";
export * from "./object-kinds.js";
export * from "./object-paths.js";
