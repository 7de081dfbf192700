export * from "./diagnostics/index.js";
export * from "./types/index.js";
export * from "./call/index.js";
export * from "./context/index.js";
export * from "./descriptor/index.js";
export * from "./resolution/index.js";
export * from "./commands/index.js";
