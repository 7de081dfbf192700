export * from "./command-call.js";
