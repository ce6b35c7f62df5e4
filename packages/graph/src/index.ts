export * from "./directed-graph.js";
export * from "./edge.js";
export * from "./errors.js";
export * from "./vertex-id.js";
