export * from "./sha256/index.js";
export * from "./utils/index.js";
