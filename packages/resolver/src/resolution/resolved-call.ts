import type { CommandCaller } from "../call/command-call.js";
import type { SignatureVariant } from "../descriptor/signature-variant.js";

/**
 * A call bound to exactly one variant with every argument converted. Holds one
 * value per declared parameter: vararg parameters collapse to one array and
 * skipped optional parameters are `undefined`.
 */
export type ResolvedCommandCall = {
  readonly caller: CommandCaller;
  readonly calleeName: string;
  readonly variant: SignatureVariant;
  /** The caller when the variant declares a receiver it satisfies. */
  readonly receiver: CommandCaller | undefined;
  readonly resolvedValueArguments: readonly unknown[];
};
