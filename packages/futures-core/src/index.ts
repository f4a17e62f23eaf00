export * from "./config.js";
export * from "./errors.js";
export * from "./sizing.js";
export * from "./types.js";
