export * from "./command-table.js";
export * from "./execute-command.js";
