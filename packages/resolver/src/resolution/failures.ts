import { argumentText, type CommandCaller, type UnresolvedCall } from "../call/command-call.js";
import { diagnosticFromCode, wholeCallSpan, type Diagnostic } from "../diagnostics/index.js";
import { formatParameter, type ValueParameter } from "../descriptor/parameters.js";
import {
  formatSignatureVariant,
  type SignatureVariant,
} from "../descriptor/signature-variant.js";
import { formatTypeName } from "../types/type-format.js";
import type { TypeDescriptor } from "../types/type-descriptor.js";

export type DisqualificationReason =
  | { kind: "receiver-mismatch"; expected: TypeDescriptor }
  | { kind: "missing-argument"; parameter: ValueParameter; paramIndex: number }
  | {
      kind: "argument-mismatch";
      parameter: ValueParameter;
      argumentIndex: number;
    }
  | { kind: "extra-arguments"; extra: number };

export type DisqualifiedVariant = {
  kind: "disqualified";
  variant: SignatureVariant;
  reason: DisqualificationReason;
};

export type ResolutionFailure =
  | {
      kind: "no-matching-variant";
      calleeName: string;
      candidateCount: number;
      disqualified: readonly DisqualifiedVariant[];
      diagnostic: Diagnostic;
    }
  | {
      kind: "ambiguous-variants";
      calleeName: string;
      candidates: readonly SignatureVariant[];
      diagnostic: Diagnostic;
    }
  | {
      kind: "argument-conversion-failed";
      calleeName: string;
      parameter: ValueParameter;
      argumentIndex: number;
      raw?: string;
      cause: unknown;
      diagnostic: Diagnostic;
    }
  | {
      kind: "receiver-rejected";
      calleeName: string;
      caller: CommandCaller;
      candidateCount: number;
      diagnostic: Diagnostic;
    };

export const formatVariantSignature = (
  calleeName: string,
  variant: SignatureVariant,
): string => `${calleeName}${formatSignatureVariant(variant)}`;

export const formatDisqualification = (
  call: UnresolvedCall,
  reason: DisqualificationReason,
): string => {
  switch (reason.kind) {
    case "receiver-mismatch":
      return `caller must be ${formatTypeName(reason.expected)}`;
    case "missing-argument":
      return `missing argument for ${formatParameter(reason.parameter)}`;
    case "argument-mismatch": {
      const argument = call.valueArguments[reason.argumentIndex];
      const text = argument ? argumentText(argument) : "";
      return `argument ${reason.argumentIndex + 1} ('${text}') does not match ${formatParameter(reason.parameter)}`;
    }
    case "extra-arguments":
      return `too many arguments (${reason.extra} extra)`;
  }
};

export const noMatchingVariant = ({
  call,
  candidateCount,
  disqualified,
}: {
  call: UnresolvedCall;
  candidateCount: number;
  disqualified: readonly DisqualifiedVariant[];
}): ResolutionFailure => ({
  kind: "no-matching-variant",
  calleeName: call.calleeName,
  candidateCount,
  disqualified,
  diagnostic: diagnosticFromCode({
    code: "RS0001",
    params: {
      kind: "no-matching-variant",
      name: call.calleeName,
      candidateCount,
      arguments: call.valueArguments.map((argument) => formatTypeName(argument.type)),
      candidates: disqualified.map((entry) => ({
        signature: formatVariantSignature(call.calleeName, entry.variant),
        reason: formatDisqualification(call, entry.reason),
      })),
    },
    span: wholeCallSpan(call.calleeName, call.valueArguments.length),
  }),
});

export const ambiguousVariants = ({
  call,
  candidates,
}: {
  call: UnresolvedCall;
  candidates: readonly SignatureVariant[];
}): ResolutionFailure => ({
  kind: "ambiguous-variants",
  calleeName: call.calleeName,
  candidates,
  diagnostic: diagnosticFromCode({
    code: "RS0002",
    params: {
      kind: "ambiguous-variants",
      name: call.calleeName,
      candidates: candidates.map((variant) =>
        formatVariantSignature(call.calleeName, variant),
      ),
    },
    span: wholeCallSpan(call.calleeName, call.valueArguments.length),
  }),
});

export const receiverRejected = ({
  call,
  expected,
}: {
  call: UnresolvedCall;
  expected: readonly TypeDescriptor[];
}): ResolutionFailure => ({
  kind: "receiver-rejected",
  calleeName: call.calleeName,
  caller: call.caller,
  candidateCount: expected.length,
  diagnostic: diagnosticFromCode({
    code: "RS0004",
    params: {
      kind: "receiver-rejected",
      name: call.calleeName,
      callerType: formatTypeName(call.caller.type),
      expected: [...new Set(expected.map(formatTypeName))],
    },
    span: { callee: call.calleeName, start: 0, end: 0 },
  }),
});

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export const argumentConversionFailed = ({
  call,
  parameter,
  argumentIndex,
  cause,
}: {
  call: UnresolvedCall;
  parameter: ValueParameter;
  argumentIndex: number;
  cause: unknown;
}): ResolutionFailure => {
  const raw = call.valueArguments[argumentIndex]?.raw;
  return {
    kind: "argument-conversion-failed",
    calleeName: call.calleeName,
    parameter,
    argumentIndex,
    raw,
    cause,
    diagnostic: diagnosticFromCode({
      code: "RS0003",
      params: {
        kind: "argument-conversion-failed",
        parameter: formatParameter(parameter),
        raw,
        reason: describeCause(cause),
      },
      span: {
        callee: call.calleeName,
        start: argumentIndex,
        end: argumentIndex + 1,
      },
    }),
  };
};
