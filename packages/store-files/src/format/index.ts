export * from "./binary-format.js";
