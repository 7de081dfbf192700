import { illegalArgument, parserFrom, type ValueArgumentParser } from "./argument-parser.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_DECIMALS = new Map<string, number>([
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["+Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
]);

const TRUTHY = new Set(["true", "yes", "enabled", "on"]);
const FALSY = new Set(["false", "no", "disabled", "off"]);

const boundedIntegerParser = ({
  typeName,
  min,
  max,
}: {
  typeName: string;
  min: number;
  max: number;
}): ValueArgumentParser<number> =>
  parserFrom((raw) => {
    if (!INTEGER_PATTERN.test(raw)) {
      return illegalArgument(`cannot parse '${raw}' as ${typeName}`);
    }
    const value = Number.parseInt(raw, 10);
    if (value < min || value > max) {
      return illegalArgument(`'${raw}' is out of range for ${typeName} (${min}..${max})`);
    }
    return value;
  });

const parseDecimal = (raw: string, typeName: string): number => {
  const special = SPECIAL_DECIMALS.get(raw);
  if (special !== undefined) return special;
  if (!DECIMAL_PATTERN.test(raw)) {
    return illegalArgument(`cannot parse '${raw}' as ${typeName}`);
  }
  return Number.parseFloat(raw);
};

export const intParser = boundedIntegerParser({
  typeName: "Int",
  min: -2_147_483_648,
  max: 2_147_483_647,
});

export const shortParser = boundedIntegerParser({
  typeName: "Short",
  min: -32_768,
  max: 32_767,
});

export const byteParser = boundedIntegerParser({
  typeName: "Byte",
  min: -128,
  max: 127,
});

const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

export const longParser: ValueArgumentParser<bigint> = parserFrom((raw) => {
  if (!INTEGER_PATTERN.test(raw)) {
    return illegalArgument(`cannot parse '${raw}' as Long`);
  }
  const value = BigInt(raw);
  if (value < LONG_MIN || value > LONG_MAX) {
    return illegalArgument(`'${raw}' is out of range for Long`);
  }
  return value;
});

export const doubleParser: ValueArgumentParser<number> = parserFrom((raw) =>
  parseDecimal(raw, "Double"),
);

export const floatParser: ValueArgumentParser<number> = parserFrom((raw) =>
  Math.fround(parseDecimal(raw, "Float")),
);

export const booleanParser: ValueArgumentParser<boolean> = parserFrom((raw) => {
  const normalized = raw.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return illegalArgument(`cannot parse '${raw}' as Boolean`);
});

export const stringParser: ValueArgumentParser<string> = parserFrom((raw) => raw);
