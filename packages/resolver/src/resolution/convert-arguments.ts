import { argumentText, type UnresolvedCall, type ValueArgument } from "../call/command-call.js";
import type { ArgumentAcceptance } from "../descriptor/acceptance.js";
import type { ValueParameter } from "../descriptor/parameters.js";
import { argumentConversionFailed, type ResolutionFailure } from "./failures.js";
import type { ArgumentMatch, MatchedVariant } from "./select-variant.js";

export type ConversionResult =
  | { success: true; values: readonly unknown[] }
  | { success: false; failure: ResolutionFailure };

type Conversion = () => unknown | Promise<unknown>;

const conversionFor = ({
  call,
  parameter,
  argument,
  acceptance,
  signal,
}: {
  call: UnresolvedCall;
  parameter: ValueParameter;
  argument: ValueArgument;
  acceptance: ArgumentAcceptance;
  signal?: AbortSignal;
}): Conversion => {
  switch (acceptance.kind) {
    case "direct":
      return parameter.kind === "string-constant"
        ? () => parameter.expectingValue
        : () => argument.value;
    case "type-variant":
      return () => acceptance.variant.map();
    case "contextual-conversion":
      return () =>
        acceptance.parser.parse(argumentText(argument), call.caller, { signal });
    case "resolution-ambiguity":
    case "impossible":
      throw new Error(
        `selected variant carries a ${acceptance.kind} acceptance for ${call.calleeName}`,
      );
  }
};

type ConvertedArgument =
  | { success: true; value: unknown }
  | { success: false; failure: ResolutionFailure };

/**
 * Runs the conversions chosen during scoring, one argument at a time. An
 * aborted signal surfaces as the abort reason rather than a conversion failure.
 */
export const convertArguments = async ({
  call,
  selected,
  signal,
}: {
  call: UnresolvedCall;
  selected: MatchedVariant;
  signal?: AbortSignal;
}): Promise<ConversionResult> => {
  const convert = async (
    parameter: ValueParameter,
    { argumentIndex, acceptance }: ArgumentMatch,
  ): Promise<ConvertedArgument> => {
    const argument = call.valueArguments[argumentIndex];
    if (!argument) {
      throw new Error(`argument ${argumentIndex} of ${call.calleeName} is missing`);
    }
    const conversion = conversionFor({ call, parameter, argument, acceptance, signal });
    signal?.throwIfAborted();
    try {
      return { success: true, value: await conversion() };
    } catch (error) {
      if (signal?.aborted) throw error;
      return {
        success: false,
        failure: argumentConversionFailed({ call, parameter, argumentIndex, cause: error }),
      };
    }
  };

  const values: unknown[] = [];
  for (const match of selected.matches) {
    switch (match.kind) {
      case "skipped":
        values.push(undefined);
        break;
      case "single": {
        const converted = await convert(match.parameter, match);
        if (!converted.success) return converted;
        values.push(converted.value);
        break;
      }
      case "vararg": {
        const items: unknown[] = [];
        for (const item of match.items) {
          const converted = await convert(match.parameter, item);
          if (!converted.success) return converted;
          items.push(converted.value);
        }
        values.push(Object.freeze(items));
        break;
      }
    }
  }

  return { success: true, values: Object.freeze(values) };
};
