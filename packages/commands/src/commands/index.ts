export * from "./edge-commands.js";
export * from "./init-command.js";
export * from "./show-command.js";
export * from "./update-graph-command.js";
export * from "./vertex-commands.js";
