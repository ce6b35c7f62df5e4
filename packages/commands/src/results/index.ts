export * from "./graph-update-result.js";
