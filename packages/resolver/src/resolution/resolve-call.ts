import type { UnresolvedCall } from "../call/command-call.js";
import type { ArgumentContext } from "../context/argument-context.js";
import { BUILTIN_ARGUMENT_CONTEXT } from "../context/builtins.js";
import type { SignatureVariant } from "../descriptor/signature-variant.js";
import type { TypeSystem } from "../types/type-descriptor.js";
import { convertArguments } from "./convert-arguments.js";
import type { ResolutionFailure } from "./failures.js";
import type { ResolvedCommandCall } from "./resolved-call.js";
import { selectVariant } from "./select-variant.js";

export type ResolveOptions = {
  types: TypeSystem;
  /** Parsers for contextual conversion. Defaults to the primitive parsers. */
  context?: ArgumentContext;
  signal?: AbortSignal;
};

export type ResolveResult =
  | { success: true; call: ResolvedCommandCall }
  | { success: false; failure: ResolutionFailure };

/**
 * Binds `call` to the single best variant of its overload set and converts
 * every argument for it. Scoring is synchronous and never throws; only the
 * conversions may suspend, and only they can fail after a variant is picked.
 */
export const resolveCall = async (
  call: UnresolvedCall,
  variants: readonly SignatureVariant[],
  { types, context = BUILTIN_ARGUMENT_CONTEXT, signal }: ResolveOptions,
): Promise<ResolveResult> => {
  const selection = selectVariant(call, variants, { context, types });
  if (!selection.success) return selection;

  const { selected } = selection;
  const converted = await convertArguments({ call, selected, signal });
  if (!converted.success) return converted;

  return {
    success: true,
    call: Object.freeze({
      caller: call.caller,
      calleeName: call.calleeName,
      variant: selected.variant,
      receiver: selected.receiver,
      resolvedValueArguments: converted.values,
    }),
  };
};
