import {
  BOOLEAN_TYPE,
  BYTE_TYPE,
  DOUBLE_TYPE,
  FLOAT_TYPE,
  INT_TYPE,
  LONG_TYPE,
  SHORT_TYPE,
  STRING_TYPE,
} from "../types/primitives.js";
import { buildArgumentContext } from "./argument-context.js";
import {
  booleanParser,
  byteParser,
  doubleParser,
  floatParser,
  intParser,
  longParser,
  shortParser,
  stringParser,
} from "./builtin-parsers.js";

/** Parsers for the primitive types every host gets by default. */
export const BUILTIN_ARGUMENT_CONTEXT = buildArgumentContext((builder) => {
  builder
    .add(INT_TYPE, intParser)
    .add(BYTE_TYPE, byteParser)
    .add(SHORT_TYPE, shortParser)
    .add(BOOLEAN_TYPE, booleanParser)
    .add(STRING_TYPE, stringParser)
    .add(LONG_TYPE, longParser)
    .add(DOUBLE_TYPE, doubleParser)
    .add(FLOAT_TYPE, floatParser);
});
