export * from "./errors.js";
export * from "./format/index.js";
export * from "./graph-storage.js";
export * from "./hash/index.js";
export * from "./node-files.js";
export * from "./object-storage.js";
export * from "./objects/index.js";
export * from "./options.js";
