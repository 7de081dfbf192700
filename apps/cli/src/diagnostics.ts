import {
  formatSpan,
  type Diagnostic,
  type DiagnosticSeverity,
} from "@overcall/resolver";

/** The invocation as typed on the command line, used to draw the snippet. */
export type CallLine = {
  callee: string;
  args: readonly string[];
};

type Highlight = { start: number; length: number };

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

/**
 * Column range covered by a span over `[callee, ...args]`. Argument `i` is
 * token `i + 1`; an empty span points at the callee.
 */
const highlightFor = (
  diagnostic: Diagnostic,
  tokens: readonly string[]
): Highlight => {
  const offsets: number[] = [];
  let column = 0;
  tokens.forEach((token) => {
    offsets.push(column);
    column += token.length + 1;
  });

  const { start, end } = diagnostic.span;
  const last = tokens.length - 1;
  const first = Math.min(start + 1, last);
  const final = Math.min(end, last);
  if (end <= start || final < first) {
    return { start: 0, length: Math.max(1, tokens[0]?.length ?? 1) };
  }

  const from = offsets[first] ?? 0;
  const to = (offsets[final] ?? 0) + (tokens[final]?.length ?? 0);
  return { start: from, length: Math.max(1, to - from) };
};

const formatSnippet = ({
  diagnostic,
  call,
  color,
}: {
  diagnostic: Diagnostic;
  call: CallLine;
  color: Colorizer;
}): string => {
  const tokens = [call.callee, ...call.args];
  const highlight = highlightFor(diagnostic, tokens);
  const marker = `${" ".repeat(highlight.start)}${color.pointer(
    diagnostic.severity,
    "^".repeat(highlight.length)
  )}`;
  const [summary = ""] = diagnostic.message.split("\n");

  return [
    "  |",
    `  | ${tokens.join(" ")}`,
    `  | ${marker} ${color.muted(summary)}`,
  ].join("\n");
};

const formatHints = (diagnostic: Diagnostic, color: Colorizer): string[] =>
  (diagnostic.hints ?? []).map(
    (hint) => `  = ${color.accent("help")}: ${hint.message}`
  );

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; call?: CallLine } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${formatSpan(diagnostic.span)} ${color.severityLabel(
    diagnostic.severity
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const snippet =
    options.call && options.call.callee === diagnostic.span.callee
      ? formatSnippet({ diagnostic, call: options.call, color })
      : undefined;

  return [header, snippet, ...formatHints(diagnostic, color)]
    .filter(Boolean)
    .join("\n");
};
