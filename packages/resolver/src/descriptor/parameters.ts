import { failWith } from "../diagnostics/index.js";
import { STRING_TYPE } from "../types/primitives.js";
import type { TypeDescriptor } from "../types/type-descriptor.js";
import { formatTypeName } from "../types/type-format.js";

export const RECEIVER_PARAMETER_NAME = "<receiver>";

const DESCRIPTOR_SPAN = { callee: "<descriptor>", start: 0, end: 0 };

export type PositionalParameter = {
  readonly kind: "positional";
  readonly name?: string;
  readonly type: TypeDescriptor;
  readonly isOptional: boolean;
  /** When set, `type` is `Array<T>` and arguments are matched against `T`. */
  readonly isVararg: boolean;
};

/** Matches exactly one argument whose raw token equals `expectingValue`. */
export type StringConstantParameter = {
  readonly kind: "string-constant";
  readonly name?: string;
  readonly expectingValue: string;
  readonly type: TypeDescriptor;
  readonly isOptional: false;
  readonly isVararg: false;
};

export type ValueParameter = PositionalParameter | StringConstantParameter;

export type ReceiverParameter = {
  readonly name: typeof RECEIVER_PARAMETER_NAME;
  readonly type: TypeDescriptor;
  readonly isOptional: boolean;
};

export const positionalParameter = ({
  name,
  type,
  isOptional = false,
  isVararg = false,
}: {
  name?: string;
  type: TypeDescriptor;
  isOptional?: boolean;
  isVararg?: boolean;
}): PositionalParameter => {
  if (isVararg && type.kind !== "array") {
    failWith({
      code: "DS0001",
      params: {
        kind: "vararg-not-array",
        parameter: name ?? "<anonymous>",
        type: formatTypeName(type),
      },
      span: DESCRIPTOR_SPAN,
    });
  }
  return Object.freeze({ kind: "positional", name, type, isOptional, isVararg });
};

export const stringConstantParameter = (
  expectingValue: string,
  { name }: { name?: string } = {},
): StringConstantParameter => {
  if (expectingValue.trim().length === 0) {
    failWith({
      code: "DS0001",
      params: { kind: "blank-constant" },
      span: DESCRIPTOR_SPAN,
    });
  }
  if (/\s/.test(expectingValue)) {
    failWith({
      code: "DS0001",
      params: { kind: "constant-whitespace", value: expectingValue },
      span: DESCRIPTOR_SPAN,
    });
  }
  return Object.freeze({
    kind: "string-constant",
    name,
    expectingValue,
    type: STRING_TYPE,
    isOptional: false,
    isVararg: false,
  });
};

export const receiverParameter = (
  type: TypeDescriptor,
  { isOptional = false }: { isOptional?: boolean } = {},
): ReceiverParameter =>
  Object.freeze({ name: RECEIVER_PARAMETER_NAME, type, isOptional });

export const isRequired = (parameter: ValueParameter): boolean =>
  !parameter.isOptional && !parameter.isVararg;

export const formatParameter = (parameter: ValueParameter): string => {
  switch (parameter.kind) {
    case "string-constant":
      return `<${parameter.expectingValue}>`;
    case "positional": {
      const prefix = parameter.isVararg ? "vararg " : "";
      const suffix = parameter.isOptional ? " = ..." : "";
      const name = parameter.name ?? "_";
      return `${prefix}${name}: ${formatTypeName(parameter.type)}${suffix}`;
    }
  }
};

export const formatReceiverParameter = (parameter: ReceiverParameter): string =>
  `${parameter.name}: ${formatTypeName(parameter.type)}`;
