import type { CommandCaller, UnresolvedCall } from "../call/command-call.js";
import type { ArgumentContext } from "../context/argument-context.js";
import {
  DIRECT,
  accepting,
  isAcceptable,
  weakerAcceptance,
  type ArgumentAcceptance,
} from "../descriptor/acceptance.js";
import { isRequired, type ValueParameter } from "../descriptor/parameters.js";
import type { SignatureVariant } from "../descriptor/signature-variant.js";
import type { TypeDescriptor, TypeSystem } from "../types/type-descriptor.js";
import {
  ambiguousVariants,
  formatDisqualification,
  formatVariantSignature,
  noMatchingVariant,
  receiverRejected,
  type DisqualificationReason,
  type DisqualifiedVariant,
  type ResolutionFailure,
} from "./failures.js";
import { logResolve, popResolve, pushResolve } from "./resolve-debug.js";

export type ArgumentMatch = {
  argumentIndex: number;
  acceptance: ArgumentAcceptance;
};

export type ParameterMatch =
  | ({ kind: "single"; parameter: ValueParameter } & ArgumentMatch)
  | {
      kind: "vararg";
      parameter: ValueParameter;
      items: readonly ArgumentMatch[];
      acceptance: ArgumentAcceptance;
    }
  | { kind: "skipped"; parameter: ValueParameter };

export type MatchedVariant = {
  kind: "matched";
  variant: SignatureVariant;
  /** Weakest acceptance level over every consumed argument. */
  level: number;
  receiver: CommandCaller | undefined;
  matches: readonly ParameterMatch[];
};

export type VariantScore = MatchedVariant | DisqualifiedVariant;

export type VariantSelection =
  | { success: true; selected: MatchedVariant }
  | { success: false; failure: ResolutionFailure };

const disqualify = (
  variant: SignatureVariant,
  reason: DisqualificationReason,
): DisqualifiedVariant => ({ kind: "disqualified", variant, reason });

/** `requiredAfter[i]` is the number of required parameters declared after `i`. */
const countRequiredAfter = (parameters: readonly ValueParameter[]): number[] => {
  const counts = new Array<number>(parameters.length).fill(0);
  let required = 0;
  for (let index = parameters.length - 1; index >= 0; index -= 1) {
    counts[index] = required;
    const parameter = parameters[index];
    if (parameter && isRequired(parameter)) required += 1;
  }
  return counts;
};

export const scoreVariant = (
  call: UnresolvedCall,
  variant: SignatureVariant,
  context: ArgumentContext,
  types: TypeSystem,
): VariantScore => {
  let receiver: CommandCaller | undefined;
  const receiverParameter = variant.receiverParameter;
  if (receiverParameter) {
    if (types.isSubtypeOrEqual(call.caller.type, receiverParameter.type)) {
      receiver = call.caller;
    } else if (!receiverParameter.isOptional) {
      return disqualify(variant, {
        kind: "receiver-mismatch",
        expected: receiverParameter.type,
      });
    }
  }

  const args = call.valueArguments;
  const parameters = variant.valueParameters;
  const requiredAfter = countRequiredAfter(parameters);
  const matches: ParameterMatch[] = [];
  let weakest: ArgumentAcceptance = DIRECT;
  let cursor = 0;

  for (const [paramIndex, parameter] of parameters.entries()) {
    const remaining = args.length - cursor;
    const reserved = requiredAfter[paramIndex] ?? 0;

    if (parameter.isVararg) {
      const take = Math.max(0, remaining - reserved);
      const items = args.slice(cursor, cursor + take).map((argument, offset) => ({
        argumentIndex: cursor + offset,
        acceptance: accepting(parameter, argument, context, types),
      }));
      const failing = items.find((item) => !isAcceptable(item.acceptance));
      if (failing) {
        return disqualify(variant, {
          kind: "argument-mismatch",
          parameter,
          argumentIndex: failing.argumentIndex,
        });
      }
      const acceptance = items.reduce<ArgumentAcceptance>(
        (acc, item) => weakerAcceptance(acc, item.acceptance),
        DIRECT,
      );
      weakest = weakerAcceptance(weakest, acceptance);
      matches.push({ kind: "vararg", parameter, items, acceptance });
      cursor += take;
      continue;
    }

    if (parameter.isOptional && remaining <= reserved) {
      matches.push({ kind: "skipped", parameter });
      continue;
    }

    const argument = args[cursor];
    if (!argument) {
      return disqualify(variant, { kind: "missing-argument", parameter, paramIndex });
    }

    const acceptance = accepting(parameter, argument, context, types);
    if (!isAcceptable(acceptance)) {
      return disqualify(variant, {
        kind: "argument-mismatch",
        parameter,
        argumentIndex: cursor,
      });
    }

    weakest = weakerAcceptance(weakest, acceptance);
    matches.push({ kind: "single", parameter, argumentIndex: cursor, acceptance });
    cursor += 1;
  }

  if (cursor < args.length) {
    return disqualify(variant, { kind: "extra-arguments", extra: args.length - cursor });
  }

  return { kind: "matched", variant, level: weakest.level, receiver, matches };
};

const rejectedByReceiverOnly = (
  disqualified: readonly DisqualifiedVariant[],
): TypeDescriptor[] | undefined => {
  const expected: TypeDescriptor[] = [];
  for (const entry of disqualified) {
    if (entry.reason.kind !== "receiver-mismatch") return undefined;
    expected.push(entry.reason.expected);
  }
  return expected.length > 0 ? expected : undefined;
};

/**
 * Scores every variant and picks the single best one. Ties at the top score
 * are reported, never broken by declaration order.
 */
export const selectVariant = (
  call: UnresolvedCall,
  variants: readonly SignatureVariant[],
  { context, types }: { context: ArgumentContext; types: TypeSystem },
): VariantSelection => {
  pushResolve(`${call.calleeName}: ${variants.length} candidate(s)`);
  const scores = variants.map((variant) => {
    const score = scoreVariant(call, variant, context, types);
    logResolve(() =>
      score.kind === "matched"
        ? `${formatVariantSignature(call.calleeName, variant)} -> level ${score.level}`
        : `${formatVariantSignature(call.calleeName, variant)} -> ${formatDisqualification(call, score.reason)}`,
    );
    return score;
  });
  popResolve();

  const matched = scores.filter(
    (score): score is MatchedVariant => score.kind === "matched",
  );

  if (matched.length === 0) {
    const disqualified = scores.filter(
      (score): score is DisqualifiedVariant => score.kind === "disqualified",
    );
    const receiverTypes = rejectedByReceiverOnly(disqualified);
    const failure = receiverTypes
      ? receiverRejected({ call, expected: receiverTypes })
      : noMatchingVariant({ call, candidateCount: variants.length, disqualified });
    return { success: false, failure };
  }

  const best = Math.max(...matched.map((score) => score.level));
  const top = matched.filter((score) => score.level === best);
  const [selected] = top;
  if (top.length > 1 || !selected) {
    return {
      success: false,
      failure: ambiguousVariants({
        call,
        candidates: top.map((score) => score.variant),
      }),
    };
  }

  return { success: true, selected };
};
