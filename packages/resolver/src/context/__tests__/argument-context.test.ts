import { describe, expect, it } from "vitest";
import {
  CONTACT_TYPE,
  MEMBER_TYPE,
  USER_TYPE,
  consoleCaller,
  createTestHierarchy,
} from "../../__tests__/fixtures.js";
import { INT_TYPE, LONG_TYPE, STRING_TYPE } from "../../types/primitives.js";
import { nullableOf } from "../../types/type-descriptor.js";
import {
  EMPTY_ARGUMENT_CONTEXT,
  SimpleArgumentContext,
  buildArgumentContext,
  mergeArgumentContexts,
  type ParserPair,
} from "../argument-context.js";
import { parserFrom } from "../argument-parser.js";
import { BUILTIN_ARGUMENT_CONTEXT } from "../builtins.js";

const types = createTestHierarchy();
const labelled = (label: string) => parserFrom(() => label);

const parse = async (pair: ParserPair | undefined) =>
  pair ? pair.parser.parse("x", consoleCaller, {}) : undefined;

describe("SimpleArgumentContext", () => {
  const contactParser = labelled("contact");
  const userParser = labelled("user");

  it("prefers an exact key over a compatible supertype key", () => {
    const context = new SimpleArgumentContext([
      { type: CONTACT_TYPE, parser: contactParser },
      { type: USER_TYPE, parser: userParser },
    ]);
    expect(context.get(USER_TYPE, types)).toBe(userParser);
  });

  it("falls back to the first supertype key in list order", () => {
    const context = new SimpleArgumentContext([
      { type: USER_TYPE, parser: userParser },
      { type: CONTACT_TYPE, parser: contactParser },
    ]);
    expect(context.get(MEMBER_TYPE, types)).toBe(userParser);
  });

  it("ignores nullability when looking up", () => {
    const context = new SimpleArgumentContext([{ type: USER_TYPE, parser: userParser }]);
    expect(context.get(nullableOf(USER_TYPE), types)).toBe(userParser);
  });

  it("returns nothing for unrelated or super types", () => {
    const context = new SimpleArgumentContext([{ type: USER_TYPE, parser: userParser }]);
    expect(context.get(CONTACT_TYPE, types)).toBeUndefined();
    expect(context.get(INT_TYPE, types)).toBeUndefined();
  });
});

describe("buildArgumentContext", () => {
  it("keeps the most recent registration per type, newest first", async () => {
    const context = buildArgumentContext((builder) => {
      builder
        .with(INT_TYPE, () => "first")
        .with(STRING_TYPE, () => "string")
        .with(INT_TYPE, () => "second");
    });

    const list = context.toList();
    expect(list.map((pair) => pair.type.kind === "nominal" && pair.type.name)).toEqual([
      "Int",
      "String",
    ]);
    expect(await parse(list[0])).toBe("second");
  });
});

describe("mergeArgumentContexts", () => {
  const base = buildArgumentContext((builder) => {
    builder.add(INT_TYPE, labelled("base-int")).add(CONTACT_TYPE, labelled("base-contact"));
  });

  it("answers from the overrides when they know the type", () => {
    const overrides = buildArgumentContext((builder) => {
      builder.add(INT_TYPE, labelled("override-int"));
    });
    const merged = mergeArgumentContexts(base, overrides);

    expect(merged.get(INT_TYPE, types)).toBe(overrides.get(INT_TYPE, types));
    expect(merged.get(CONTACT_TYPE, types)).toBe(base.get(CONTACT_TYPE, types));
    expect(merged.get(LONG_TYPE, types)).toBeUndefined();
  });

  it("matches pair-list overrides by supertype", () => {
    const contactOverride = labelled("override-contact");
    const merged = mergeArgumentContexts(base, [{ type: CONTACT_TYPE, parser: contactOverride }]);
    expect(merged.get(MEMBER_TYPE, types)).toBe(contactOverride);
  });

  it("lists override pairs before base pairs", () => {
    const merged = mergeArgumentContexts(base, [{ type: STRING_TYPE, parser: labelled("s") }]);
    expect(
      merged.toList().map((pair) => pair.type.kind === "nominal" && pair.type.name),
    ).toEqual(["String", "Contact", "Int"]);
  });

  it("returns the other side when one side is empty", () => {
    expect(mergeArgumentContexts(base, EMPTY_ARGUMENT_CONTEXT)).toBe(base);
    expect(mergeArgumentContexts(EMPTY_ARGUMENT_CONTEXT, base)).toBe(base);
    expect(mergeArgumentContexts(base, [])).toBe(base);
  });

  it("never mutates its inputs", () => {
    const before = BUILTIN_ARGUMENT_CONTEXT.toList().length;
    mergeArgumentContexts(BUILTIN_ARGUMENT_CONTEXT, [{ type: USER_TYPE, parser: labelled("u") }]);
    expect(BUILTIN_ARGUMENT_CONTEXT.toList()).toHaveLength(before);
  });
});
