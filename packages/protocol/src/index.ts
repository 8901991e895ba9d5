export * from "./types.js";
export * from "./errors.js";
export * from "./limits.js";
export * from "./helpers.js";
export * from "./validate.js";
