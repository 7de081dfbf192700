import { describe, expect, it } from "vitest";
import { INT_TYPE, STRING_TYPE } from "../../types/primitives.js";
import { argumentText, createCall, rawArgument, typedArgument } from "../command-call.js";

describe("call arguments", () => {
  it("treats raw tokens as String values", () => {
    const argument = rawArgument("hello");
    expect(argument.type).toBe(STRING_TYPE);
    expect(argument.value).toBe("hello");
    expect(argument.raw).toBe("hello");
    expect(argument.typeVariants).toEqual([]);
  });

  it("shows the raw token when there is one", () => {
    expect(argumentText(typedArgument(5, INT_TYPE, { raw: "05" }))).toBe("05");
    expect(argumentText(typedArgument(5, INT_TYPE))).toBe("5");
  });

  it("freezes the call and its argument list", () => {
    const args = [rawArgument("a")];
    const call = createCall({ caller: { type: STRING_TYPE }, calleeName: "echo", valueArguments: args });
    args.push(rawArgument("b"));
    expect(call.valueArguments).toHaveLength(1);
    expect(Object.isFrozen(call)).toBe(true);
  });
});
