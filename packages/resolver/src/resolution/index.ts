export * from "./resolved-call.js";
export * from "./failures.js";
export * from "./select-variant.js";
export * from "./convert-arguments.js";
export * from "./resolve-call.js";
