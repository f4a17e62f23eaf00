export * from "./events.js";
export * from "./kill-switch.js";
export * from "./mutex.js";
export * from "./pipeline.js";
export * from "./state-machine.js";
