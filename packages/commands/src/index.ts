export * from "./commands/index.js";
export * from "./errors/index.js";
export * from "./graph-command.js";
export * from "./graph-repository.js";
export * from "./results/index.js";
export * from "./types.js";
