import type { CallSummary } from "./manifest.js";

const normalizeBigInt = (value: bigint): string => `${value}n`;

/** Makes resolved argument values JSON-safe; bigints become `"<n>n"`. */
const normalizeOutput = (value: unknown): unknown => {
  if (typeof value === "bigint") {
    return normalizeBigInt(value);
  }

  if (Array.isArray(value)) {
    return value.map(normalizeOutput);
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, normalizeOutput(entry)])
    );
  }

  return value;
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput(value), undefined, 2);

/** One-line rendering of a single resolved argument. */
export const formatValue = (value: unknown): string => {
  if (value === undefined) return "undefined";
  if (typeof value === "bigint") return normalizeBigInt(value);
  if (typeof value === "number") return String(value);
  return JSON.stringify(normalizeOutput(value)) ?? String(value);
};

export const formatSummary = (summary: CallSummary): string => {
  const lines = [`resolved ${summary.signature}`];
  if (summary.receiver) {
    lines.push(`  receiver: ${summary.receiver}`);
  }
  lines.push(`  arguments: (${summary.arguments.map(formatValue).join(", ")})`);
  if (summary.description) {
    lines.push(`  ${summary.description}`);
  }
  return lines.join("\n");
};

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};

export const printSummary = (summary: CallSummary): void => {
  console.log(formatSummary(summary));
};
