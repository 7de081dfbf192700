import type { ResolvedCommandCall } from "../resolution/resolved-call.js";
import {
  formatParameter,
  formatReceiverParameter,
  type ReceiverParameter,
  type ValueParameter,
} from "./parameters.js";

export type CallOptions = {
  signal?: AbortSignal;
};

export type CommandAction = (
  call: ResolvedCommandCall,
  options: CallOptions,
) => unknown | Promise<unknown>;

/** One overload of a command: a receiver constraint and a parameter shape bound to an action. */
export interface SignatureVariant {
  readonly receiverParameter?: ReceiverParameter;
  readonly valueParameters: readonly ValueParameter[];
  readonly description?: string;
  call(resolved: ResolvedCommandCall, options?: CallOptions): Promise<unknown>;
}

export const createSignatureVariant = ({
  receiver,
  parameters,
  action,
  description,
}: {
  receiver?: ReceiverParameter;
  parameters: readonly ValueParameter[];
  action: CommandAction;
  description?: string;
}): SignatureVariant =>
  Object.freeze({
    receiverParameter: receiver,
    valueParameters: Object.freeze([...parameters]),
    description,
    call: async (resolved: ResolvedCommandCall, options: CallOptions = {}) =>
      action(resolved, options),
  });

export const formatSignatureVariant = (variant: SignatureVariant): string => {
  const parameters = variant.valueParameters.map(formatParameter);
  const receiver = variant.receiverParameter
    ? [formatReceiverParameter(variant.receiverParameter)]
    : [];
  return `(${[...receiver, ...parameters].join(", ")})`;
};
