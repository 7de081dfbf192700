import type { TypeVariant, ValueArgument } from "../call/command-call.js";
import type { ArgumentContext } from "../context/argument-context.js";
import type { ValueArgumentParser } from "../context/argument-parser.js";
import {
  elementTypeOf,
  type TypeDescriptor,
  type TypeSystem,
} from "../types/type-descriptor.js";
import type { ValueParameter } from "./parameters.js";

export const DIRECT_LEVEL = Number.MAX_SAFE_INTEGER;
export const TYPE_VARIANT_LEVEL = 20;
export const CONTEXTUAL_CONVERSION_LEVEL = 10;
export const AMBIGUITY_LEVEL = 0;
export const IMPOSSIBLE_LEVEL = -1;

/**
 * How one argument can reach one parameter. Higher `level` is better and only
 * levels above zero are acceptable.
 */
export type ArgumentAcceptance =
  | { readonly kind: "direct"; readonly level: typeof DIRECT_LEVEL }
  | {
      readonly kind: "type-variant";
      readonly level: typeof TYPE_VARIANT_LEVEL;
      readonly variant: TypeVariant;
    }
  | {
      readonly kind: "contextual-conversion";
      readonly level: typeof CONTEXTUAL_CONVERSION_LEVEL;
      readonly parser: ValueArgumentParser;
    }
  | {
      // Reserved for several equally applicable conversions; first-match
      // acceptance never produces it.
      readonly kind: "resolution-ambiguity";
      readonly level: typeof AMBIGUITY_LEVEL;
      readonly candidates: readonly TypeVariant[];
    }
  | { readonly kind: "impossible"; readonly level: typeof IMPOSSIBLE_LEVEL };

export const DIRECT: ArgumentAcceptance = Object.freeze({
  kind: "direct",
  level: DIRECT_LEVEL,
});

export const IMPOSSIBLE: ArgumentAcceptance = Object.freeze({
  kind: "impossible",
  level: IMPOSSIBLE_LEVEL,
});

export const withTypeVariant = (variant: TypeVariant): ArgumentAcceptance =>
  Object.freeze({ kind: "type-variant", level: TYPE_VARIANT_LEVEL, variant });

export const withContextualConversion = (
  parser: ValueArgumentParser,
): ArgumentAcceptance =>
  Object.freeze({
    kind: "contextual-conversion",
    level: CONTEXTUAL_CONVERSION_LEVEL,
    parser,
  });

export const resolutionAmbiguity = (
  candidates: readonly TypeVariant[],
): ArgumentAcceptance =>
  Object.freeze({
    kind: "resolution-ambiguity",
    level: AMBIGUITY_LEVEL,
    candidates: Object.freeze([...candidates]),
  });

export const isAcceptable = (acceptance: ArgumentAcceptance): boolean =>
  acceptance.level > 0;

/** Weakest link of two acceptances; the first wins on equal levels. */
export const weakerAcceptance = (
  a: ArgumentAcceptance,
  b: ArgumentAcceptance,
): ArgumentAcceptance => (b.level < a.level ? b : a);

const acceptingType = (
  expected: TypeDescriptor,
  argument: ValueArgument,
  context: ArgumentContext,
  types: TypeSystem,
): ArgumentAcceptance => {
  if (types.isSubtypeOrEqual(argument.type, expected)) return DIRECT;

  const variant = argument.typeVariants.find((candidate) =>
    types.isSubtypeOrEqual(candidate.outType, expected),
  );
  if (variant) return withTypeVariant(variant);

  const parser = context.get(expected, types);
  if (parser) return withContextualConversion(parser);

  return IMPOSSIBLE;
};

/**
 * Scores how well `argument` fits `parameter`. Never throws: an unreachable
 * parameter is `impossible`, not an error.
 */
export const accepting = (
  parameter: ValueParameter,
  argument: ValueArgument,
  context: ArgumentContext,
  types: TypeSystem,
): ArgumentAcceptance => {
  switch (parameter.kind) {
    case "string-constant":
      return argument.raw === parameter.expectingValue ? DIRECT : IMPOSSIBLE;
    case "positional": {
      const expected = parameter.isVararg
        ? elementTypeOf(parameter.type)
        : parameter.type;
      return acceptingType(expected, argument, context, types);
    }
  }
};

export const accepts = (
  parameter: ValueParameter,
  argument: ValueArgument,
  context: ArgumentContext,
  types: TypeSystem,
): boolean => isAcceptable(accepting(parameter, argument, context, types));
