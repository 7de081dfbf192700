export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "types"
  | "descriptor"
  | "resolution"
  | "commands"
  | "execution"
  | "config";

/**
 * Half-open range of argument indices within one invocation of `callee`.
 * `start === end` points between arguments (e.g. a missing trailing one).
 */
export type CallSpan = {
  callee: string;
  start: number;
  end: number;
};

export type DiagnosticHint = {
  message: string;
};

export type Diagnostic = {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: CallSpan;
  phase?: DiagnosticPhase;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
};

export type DiagnosticInput = Omit<Diagnostic, "severity" | "phase"> & {
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
