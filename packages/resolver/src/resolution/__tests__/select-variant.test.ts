import { describe, expect, it } from "vitest";
import { typedArgument } from "../../call/command-call.js";
import {
  EMPTY_ARGUMENT_CONTEXT,
  buildArgumentContext,
} from "../../context/argument-context.js";
import { BUILTIN_ARGUMENT_CONTEXT } from "../../context/builtins.js";
import {
  DIRECT,
  IMPOSSIBLE,
  weakerAcceptance,
  withContextualConversion,
} from "../../descriptor/acceptance.js";
import { intParser } from "../../context/builtin-parsers.js";
import {
  positionalParameter,
  receiverParameter,
  stringConstantParameter,
} from "../../descriptor/parameters.js";
import { createSignatureVariant } from "../../descriptor/signature-variant.js";
import {
  MEMBER_CALLER_TYPE,
  MEMBER_TYPE,
  USER_TYPE,
  callOf,
  consoleCaller,
  createTestHierarchy,
  memberCaller,
  noop,
} from "../../__tests__/fixtures.js";
import { INT_TYPE, STRING_TYPE } from "../../types/primitives.js";
import { arrayOf } from "../../types/type-descriptor.js";
import { scoreVariant, selectVariant } from "../select-variant.js";

const types = createTestHierarchy();
const options = { context: BUILTIN_ARGUMENT_CONTEXT, types };

const addVariant = createSignatureVariant({
  parameters: [
    stringConstantParameter("add"),
    positionalParameter({ name: "n", type: INT_TYPE }),
  ],
  action: noop,
});
const targetVariant = createSignatureVariant({
  parameters: [positionalParameter({ name: "target", type: STRING_TYPE })],
  action: noop,
});

describe("selectVariant", () => {
  it("picks the constant-led variant for `foo add 5`", () => {
    const selection = selectVariant(callOf("foo", ["add", "5"]), [addVariant, targetVariant], options);
    expect(selection.success).toBe(true);
    if (!selection.success) return;
    expect(selection.selected.variant).toBe(addVariant);
    expect(selection.selected.level).toBe(10);
  });

  it("scores a pre-typed integer as direct", () => {
    const call = callOf("foo", ["add", typedArgument(5, INT_TYPE)]);
    const selection = selectVariant(call, [addVariant, targetVariant], options);
    expect(selection.success && selection.selected.level).toBe(DIRECT.level);
  });

  it("picks the String variant for `foo bar`", () => {
    const selection = selectVariant(callOf("foo", ["bar"]), [addVariant, targetVariant], options);
    expect(selection.success).toBe(true);
    if (!selection.success) return;
    expect(selection.selected.variant).toBe(targetVariant);
    expect(selection.selected.matches).toEqual([
      { kind: "single", parameter: targetVariant.valueParameters[0], argumentIndex: 0, acceptance: DIRECT },
    ]);
  });

  it("prefers the variant whose weakest argument is stronger", () => {
    const intVariant = createSignatureVariant({
      parameters: [positionalParameter({ name: "n", type: INT_TYPE })],
      action: noop,
    });

    const fromText = selectVariant(callOf("foo", ["5"]), [intVariant, targetVariant], options);
    expect(fromText.success && fromText.selected.variant).toBe(targetVariant);

    const fromInt = selectVariant(
      callOf("foo", [typedArgument(5, INT_TYPE)]),
      [intVariant, targetVariant],
      options,
    );
    expect(fromInt.success && fromInt.selected.variant).toBe(intVariant);
  });

  it("reports ties instead of picking one", () => {
    const first = createSignatureVariant({
      parameters: [positionalParameter({ name: "a", type: INT_TYPE })],
      action: noop,
    });
    const second = createSignatureVariant({
      parameters: [positionalParameter({ name: "b", type: INT_TYPE })],
      action: noop,
    });

    const selection = selectVariant(callOf("foo", ["5"]), [first, second], options);
    expect(selection.success).toBe(false);
    if (selection.success) return;
    expect(selection.failure.kind).toBe("ambiguous-variants");
    if (selection.failure.kind !== "ambiguous-variants") return;
    expect(selection.failure.candidates).toEqual([first, second]);
    expect(selection.failure.diagnostic.code).toBe("RS0002");
    expect(selection.failure.diagnostic.message).toBe(
      "ambiguous call to foo, candidates:\n  - foo(a: Int)\n  - foo(b: Int)",
    );
  });

  it("explains why every candidate was disqualified", () => {
    const selection = selectVariant(callOf("foo", ["bar", "baz"]), [addVariant, targetVariant], options);
    expect(selection.success).toBe(false);
    if (selection.success) return;
    expect(selection.failure.kind).toBe("no-matching-variant");
    expect(selection.failure.diagnostic.span).toEqual({ callee: "foo", start: 0, end: 2 });
    expect(selection.failure.diagnostic.message).toBe(
      [
        "no variant of foo matches the arguments (2 considered)",
        "argument types: (String, String)",
        "candidates:",
        "  - foo(<add>, n: Int): argument 1 ('bar') does not match <add>",
        "  - foo(target: String): too many arguments (1 extra)",
      ].join("\n"),
    );
  });

  it("fails with no candidates at all", () => {
    const selection = selectVariant(callOf("foo", []), [], options);
    expect(selection.success).toBe(false);
    if (selection.success) return;
    expect(selection.failure.kind).toBe("no-matching-variant");
    if (selection.failure.kind !== "no-matching-variant") return;
    expect(selection.failure.candidateCount).toBe(0);
  });
});

describe("receiver checks", () => {
  const memberOnly = createSignatureVariant({
    receiver: receiverParameter(MEMBER_CALLER_TYPE),
    parameters: [positionalParameter({ name: "target", type: STRING_TYPE })],
    action: noop,
  });

  it("binds the caller as receiver when it fits", () => {
    const selection = selectVariant(callOf("kick", ["bob"], memberCaller), [memberOnly], options);
    expect(selection.success && selection.selected.receiver).toBe(memberCaller);
  });

  it("reports receiver rejection when only the caller is wrong", () => {
    const selection = selectVariant(callOf("kick", ["bob"], consoleCaller), [memberOnly], options);
    expect(selection.success).toBe(false);
    if (selection.success) return;
    expect(selection.failure.kind).toBe("receiver-rejected");
    expect(selection.failure.diagnostic.message).toBe(
      "kick cannot be called by ConsoleCaller (expected MemberCaller)",
    );
  });

  it("reports no match when other reasons are mixed in", () => {
    const selection = selectVariant(
      callOf("kick", ["bob", "extra"], consoleCaller),
      [memberOnly, targetVariant],
      options,
    );
    expect(selection.success).toBe(false);
    if (selection.success) return;
    expect(selection.failure.kind).toBe("no-matching-variant");
  });

  it("leaves an optional receiver unbound instead of disqualifying", () => {
    const optional = createSignatureVariant({
      receiver: receiverParameter(MEMBER_CALLER_TYPE, { isOptional: true }),
      parameters: [],
      action: noop,
    });
    const score = scoreVariant(callOf("who", [], consoleCaller), optional, EMPTY_ARGUMENT_CONTEXT, types);
    expect(score.kind).toBe("matched");
    if (score.kind !== "matched") return;
    expect(score.receiver).toBeUndefined();
    expect(score.level).toBe(DIRECT.level);
  });
});

describe("parameter walking", () => {
  it("skips trailing optional parameters without arguments", () => {
    const variant = createSignatureVariant({
      parameters: [
        positionalParameter({ name: "a", type: INT_TYPE }),
        positionalParameter({ name: "b", type: INT_TYPE, isOptional: true }),
      ],
      action: noop,
    });
    const score = scoreVariant(callOf("sum", ["1"]), variant, BUILTIN_ARGUMENT_CONTEXT, types);
    expect(score.kind === "matched" && score.matches.map((match) => match.kind)).toEqual([
      "single",
      "skipped",
    ]);
  });

  it("keeps arguments for required parameters after an optional one", () => {
    const variant = createSignatureVariant({
      parameters: [
        positionalParameter({ name: "count", type: INT_TYPE, isOptional: true }),
        positionalParameter({ name: "text", type: STRING_TYPE }),
      ],
      action: noop,
    });

    const one = scoreVariant(callOf("say", ["hi"]), variant, BUILTIN_ARGUMENT_CONTEXT, types);
    expect(one.kind === "matched" && one.matches.map((match) => match.kind)).toEqual([
      "skipped",
      "single",
    ]);

    const two = scoreVariant(callOf("say", ["3", "hi"]), variant, BUILTIN_ARGUMENT_CONTEXT, types);
    expect(two.kind === "matched" && two.matches.map((match) => match.kind)).toEqual([
      "single",
      "single",
    ]);
  });

  it("disqualifies on a missing required argument", () => {
    const score = scoreVariant(callOf("foo", ["add"]), addVariant, BUILTIN_ARGUMENT_CONTEXT, types);
    expect(score.kind).toBe("disqualified");
    if (score.kind !== "disqualified") return;
    expect(score.reason).toEqual({
      kind: "missing-argument",
      parameter: addVariant.valueParameters[1],
      paramIndex: 1,
    });
  });

  it("lets a vararg absorb zero or more trailing arguments", () => {
    const variant = createSignatureVariant({
      parameters: [
        positionalParameter({ name: "rest", type: arrayOf(STRING_TYPE), isVararg: true }),
        positionalParameter({ name: "last", type: INT_TYPE }),
      ],
      action: noop,
    });

    const score = scoreVariant(callOf("tag", ["a", "b", "3"]), variant, BUILTIN_ARGUMENT_CONTEXT, types);
    expect(score.kind).toBe("matched");
    if (score.kind !== "matched") return;
    const [rest, last] = score.matches;
    expect(rest?.kind === "vararg" && rest.items.map((item) => item.argumentIndex)).toEqual([0, 1]);
    expect(last?.kind === "single" && last.argumentIndex).toBe(2);
    expect(score.level).toBe(10);

    const empty = scoreVariant(callOf("tag", ["3"]), variant, BUILTIN_ARGUMENT_CONTEXT, types);
    if (empty.kind !== "matched") throw new Error("expected a match");
    const [emptyRest] = empty.matches;
    expect(emptyRest?.kind === "vararg" && emptyRest.items).toEqual([]);
  });
});

describe("vararg weakest link", () => {
  const users = createSignatureVariant({
    parameters: [positionalParameter({ name: "users", type: arrayOf(USER_TYPE), isVararg: true })],
    action: noop,
  });
  const userContext = buildArgumentContext((builder) => {
    builder.with(USER_TYPE, (raw) => ({ name: raw }));
  });

  it("folds [direct, contextual, impossible] down to impossible", () => {
    const folded = [DIRECT, withContextualConversion(intParser), IMPOSSIBLE].reduce(weakerAcceptance);
    expect(folded).toBe(IMPOSSIBLE);
  });

  it("scores the vararg by its weakest argument", () => {
    const score = scoreVariant(
      callOf("greet", [typedArgument({}, MEMBER_TYPE), "bob"]),
      users,
      userContext,
      types,
    );
    expect(score.kind === "matched" && score.level).toBe(10);
  });

  it("disqualifies the variant when one argument has no path", () => {
    const score = scoreVariant(
      callOf("greet", [typedArgument({}, MEMBER_TYPE), "bob"]),
      users,
      EMPTY_ARGUMENT_CONTEXT,
      types,
    );
    expect(score.kind).toBe("disqualified");
    if (score.kind !== "disqualified") return;
    expect(score.reason).toEqual({
      kind: "argument-mismatch",
      parameter: users.valueParameters[0],
      argumentIndex: 1,
    });
  });
});
