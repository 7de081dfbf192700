export * from "./parameters.js";
export * from "./acceptance.js";
export * from "./signature-variant.js";
