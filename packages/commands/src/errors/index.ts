export * from "./command-errors.js";
export * from "./graph-command-error.js";
export * from "./snapshot-errors.js";
