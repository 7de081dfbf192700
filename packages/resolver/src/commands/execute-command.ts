import type { UnresolvedCall } from "../call/command-call.js";
import type { ArgumentContext } from "../context/argument-context.js";
import {
  diagnosticFromCode,
  wholeCallSpan,
  type Diagnostic,
} from "../diagnostics/index.js";
import type { ResolvedCommandCall } from "../resolution/resolved-call.js";
import { resolveCall } from "../resolution/resolve-call.js";
import type { TypeSystem } from "../types/type-descriptor.js";
import type { CommandTable } from "./command-table.js";

export type ExecuteOptions = {
  table: CommandTable;
  types: TypeSystem;
  context?: ArgumentContext;
  signal?: AbortSignal;
};

export type ExecuteResult =
  | { success: true; call: ResolvedCommandCall; value: unknown }
  | { success: false; diagnostics: Diagnostic[] };

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Looks up the callee, resolves the call against its overload set and awaits
 * the selected variant's action. Cancellation of `signal` propagates to the
 * parsers and the action untouched.
 */
export const executeCommand = async (
  call: UnresolvedCall,
  { table, types, context, signal }: ExecuteOptions,
): Promise<ExecuteResult> => {
  const span = wholeCallSpan(call.calleeName, call.valueArguments.length);
  const command = table.lookup(call.calleeName);
  if (!command) {
    return {
      success: false,
      diagnostics: [
        diagnosticFromCode({
          code: "CM0002",
          params: { kind: "unknown-command", name: call.calleeName },
          span,
        }),
      ],
    };
  }

  const resolved = await resolveCall(call, command.variants, { types, context, signal });
  if (!resolved.success) {
    return { success: false, diagnostics: [resolved.failure.diagnostic] };
  }

  try {
    const value = await resolved.call.variant.call(resolved.call, { signal });
    return { success: true, call: resolved.call, value };
  } catch (error) {
    if (signal?.aborted) throw error;
    return {
      success: false,
      diagnostics: [
        diagnosticFromCode({
          code: "EX0001",
          params: {
            kind: "action-failed",
            name: command.primaryName,
            message: describeError(error),
          },
          span,
        }),
      ],
    };
  }
};
