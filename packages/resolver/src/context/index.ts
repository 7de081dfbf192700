export * from "./argument-parser.js";
export * from "./argument-context.js";
export * from "./builtin-parsers.js";
export * from "./builtins.js";
