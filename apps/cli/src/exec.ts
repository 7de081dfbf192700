import {
  DiagnosticError,
  createCall,
  executeCommand,
  rawArgument,
} from "@overcall/resolver";
import { getConfig, type OvercallConfig } from "./config/index.js";
import { formatCliDiagnostic, type CallLine } from "./diagnostics.js";
import { loadRegistry, parseTypeExpression, type CallSummary } from "./manifest.js";
import { printJson, printSummary } from "./output.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  process.exitCode = await run(getConfig());
}

/** Resolves and runs one invocation; returns the process exit code. */
export const run = async (config: OvercallConfig): Promise<number> => {
  const { types, table } = loadRegistry(config.manifest);
  const call = createCall({
    caller: { type: parseTypeExpression(config.caller, types), name: "cli" },
    calleeName: config.callee,
    valueArguments: config.args.map((arg) => rawArgument(arg)),
  });

  const result = await executeCommand(call, { table, types });
  if (!result.success) {
    const line: CallLine = { callee: config.callee, args: config.args };
    result.diagnostics.forEach((diagnostic) =>
      console.error(formatCliDiagnostic(diagnostic, { color: config.color, call: line }))
    );
    return 1;
  }

  if (!isCallSummary(result.value)) {
    throw new Error(`command ${config.callee} returned an unexpected value`);
  }
  if (config.json) {
    printJson(result.value);
  } else {
    printSummary(result.value);
  }
  return 0;
};

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    const color = getConfig().color;
    error.diagnostics.forEach((diagnostic) =>
      console.error(formatCliDiagnostic(diagnostic, { color }))
    );
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}

const isCallSummary = (value: unknown): value is CallSummary =>
  !!value &&
  typeof value === "object" &&
  "signature" in value &&
  typeof value.signature === "string" &&
  "arguments" in value &&
  Array.isArray(value.arguments);
