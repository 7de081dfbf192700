import { STRING_TYPE } from "../types/primitives.js";
import type { TypeDescriptor } from "../types/type-descriptor.js";

/** Identity of whoever issued a call; checked against receiver parameters. */
export type CommandCaller = {
  readonly type: TypeDescriptor;
  readonly name?: string;
};

/**
 * An alternative, already-typed representation an argument offers up front.
 * `map` produces the value on demand and may fail or suspend.
 */
export type TypeVariant = {
  readonly outType: TypeDescriptor;
  map(): unknown | Promise<unknown>;
};

export type ValueArgument = {
  /** Native type of `value`. Raw-token arguments are `String`. */
  readonly type: TypeDescriptor;
  readonly value: unknown;
  /** Raw text of the argument, when it was typed by a user. */
  readonly raw?: string;
  readonly typeVariants: readonly TypeVariant[];
};

export type UnresolvedCall = {
  readonly caller: CommandCaller;
  /** One of the callee command's names or aliases. */
  readonly calleeName: string;
  readonly valueArguments: readonly ValueArgument[];
};

export const rawArgument = (
  raw: string,
  typeVariants: readonly TypeVariant[] = [],
): ValueArgument =>
  Object.freeze({
    type: STRING_TYPE,
    value: raw,
    raw,
    typeVariants: Object.freeze([...typeVariants]),
  });

export const typedArgument = (
  value: unknown,
  type: TypeDescriptor,
  { raw, typeVariants = [] }: { raw?: string; typeVariants?: readonly TypeVariant[] } = {},
): ValueArgument =>
  Object.freeze({
    type,
    value,
    raw,
    typeVariants: Object.freeze([...typeVariants]),
  });

export const typeVariant = (
  outType: TypeDescriptor,
  map: () => unknown | Promise<unknown>,
): TypeVariant => Object.freeze({ outType, map });

export const createCall = ({
  caller,
  calleeName,
  valueArguments,
}: {
  caller: CommandCaller;
  calleeName: string;
  valueArguments: readonly ValueArgument[];
}): UnresolvedCall =>
  Object.freeze({
    caller,
    calleeName,
    valueArguments: Object.freeze([...valueArguments]),
  });

/** Text shown for an argument in diagnostics and rendered call lines. */
export const argumentText = (argument: ValueArgument): string =>
  argument.raw ?? String(argument.value);
