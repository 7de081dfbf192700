import { nominalType } from "./type-descriptor.js";

export const ANY_TYPE = nominalType("Any");
export const STRING_TYPE = nominalType("String");
export const BOOLEAN_TYPE = nominalType("Boolean");
export const INT_TYPE = nominalType("Int");
export const LONG_TYPE = nominalType("Long");
export const SHORT_TYPE = nominalType("Short");
export const BYTE_TYPE = nominalType("Byte");
export const DOUBLE_TYPE = nominalType("Double");
export const FLOAT_TYPE = nominalType("Float");

export const PRIMITIVE_TYPES = [
  STRING_TYPE,
  BOOLEAN_TYPE,
  INT_TYPE,
  LONG_TYPE,
  SHORT_TYPE,
  BYTE_TYPE,
  DOUBLE_TYPE,
  FLOAT_TYPE,
] as const;
