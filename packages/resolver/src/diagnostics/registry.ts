import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export type CandidateMismatch = {
  signature: string;
  reason: string;
};

type DiagnosticParamsMap = {
  TS0001:
    | { kind: "unknown-supertype"; name: string; supertype: string }
    | { kind: "cyclic-hierarchy"; name: string }
    | { kind: "duplicate-type"; name: string }
    | { kind: "unknown-type"; name: string };
  DS0001:
    | { kind: "blank-constant" }
    | { kind: "constant-whitespace"; value: string }
    | { kind: "vararg-not-array"; parameter: string; type: string };
  RS0001: {
    kind: "no-matching-variant";
    name: string;
    candidateCount: number;
    arguments?: readonly string[];
    candidates?: readonly CandidateMismatch[];
  };
  RS0002: {
    kind: "ambiguous-variants";
    name: string;
    candidates: readonly string[];
  };
  RS0003: {
    kind: "argument-conversion-failed";
    parameter: string;
    raw?: string;
    reason: string;
  };
  RS0004: {
    kind: "receiver-rejected";
    name: string;
    callerType: string;
    expected: readonly string[];
  };
  CM0001:
    | { kind: "duplicate-command"; name: string }
    | { kind: "duplicate-alias"; alias: string; owner: string };
  CM0002: { kind: "unknown-command"; name: string };
  EX0001: { kind: "action-failed"; name: string; message: string };
  CF0001:
    | { kind: "manifest-unreadable"; path: string; message: string }
    | { kind: "invalid-manifest"; path: string; issues: readonly string[] };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const formatArgumentList = (args: readonly string[]): string =>
  `(${args.join(", ")})`;

const formatCandidateLines = (
  candidates: readonly CandidateMismatch[],
): string =>
  candidates
    .map((candidate) => `  - ${candidate.signature}: ${candidate.reason}`)
    .join("\n");

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  TS0001: {
    code: "TS0001",
    message: (params) => {
      switch (params.kind) {
        case "unknown-supertype":
          return `type '${params.name}' extends unknown type '${params.supertype}'`;
        case "cyclic-hierarchy":
          return `type '${params.name}' cannot be its own supertype`;
        case "duplicate-type":
          return `type '${params.name}' is already declared`;
        case "unknown-type":
          return `type '${params.name}' is not declared`;
        default:
          return exhaustive(params);
      }
    },
    severity: "error",
    phase: "types",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TS0001"]>,
  DS0001: {
    code: "DS0001",
    message: (params) => {
      switch (params.kind) {
        case "blank-constant":
          return "constant parameter must not be blank";
        case "constant-whitespace":
          return `constant parameter '${params.value}' must not contain whitespace`;
        case "vararg-not-array":
          return `vararg parameter '${params.parameter}' must have an array type, got ${params.type}`;
        default:
          return exhaustive(params);
      }
    },
    severity: "error",
    phase: "descriptor",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DS0001"]>,
  RS0001: {
    code: "RS0001",
    message: (params) => {
      const header = `no variant of ${params.name} matches the arguments (${params.candidateCount} considered)`;
      const details: string[] = [];
      if (params.arguments) {
        details.push(`argument types: ${formatArgumentList(params.arguments)}`);
      }
      if (params.candidates && params.candidates.length > 0) {
        details.push(`candidates:\n${formatCandidateLines(params.candidates)}`);
      }
      return details.length > 0 ? `${header}\n${details.join("\n")}` : header;
    },
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    message: (params) =>
      `ambiguous call to ${params.name}, candidates:\n${params.candidates
        .map((candidate) => `  - ${candidate}`)
        .join("\n")}`,
    severity: "error",
    phase: "resolution",
    hints: [
      {
        message:
          "Give the tied variants distinct parameter types or a leading constant so exactly one matches best.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  RS0003: {
    code: "RS0003",
    message: (params) =>
      params.raw === undefined
        ? `cannot convert argument for ${params.parameter}: ${params.reason}`
        : `cannot convert '${params.raw}' for ${params.parameter}: ${params.reason}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0003"]>,
  RS0004: {
    code: "RS0004",
    message: (params) =>
      `${params.name} cannot be called by ${params.callerType} (expected ${params.expected.join(" | ")})`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0004"]>,
  CM0001: {
    code: "CM0001",
    message: (params) =>
      params.kind === "duplicate-command"
        ? `command '${params.name}' is already registered`
        : `alias '${params.alias}' is already taken by '${params.owner}'`,
    severity: "error",
    phase: "commands",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CM0001"]>,
  CM0002: {
    code: "CM0002",
    message: (params) => `unknown command '${params.name}'`,
    severity: "error",
    phase: "commands",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CM0002"]>,
  EX0001: {
    code: "EX0001",
    message: (params) => `command ${params.name} failed: ${params.message}`,
    severity: "error",
    phase: "execution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["EX0001"]>,
  CF0001: {
    code: "CF0001",
    message: (params) =>
      params.kind === "manifest-unreadable"
        ? `cannot read manifest ${params.path}: ${params.message}`
        : `invalid manifest ${params.path}:\n${params.issues
            .map((issue) => `  - ${issue}`)
            .join("\n")}`,
    severity: "error",
    phase: "config",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CF0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];

const exhaustive = (_value: never): never => _value;
