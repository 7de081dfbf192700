export * from "./type-descriptor.js";
export * from "./type-format.js";
export * from "./type-hierarchy.js";
export * from "./primitives.js";
