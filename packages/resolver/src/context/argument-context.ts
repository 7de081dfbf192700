import type { CommandCaller } from "../call/command-call.js";
import {
  nonNullOf,
  typesAreEqual,
  type TypeDescriptor,
  type TypeSystem,
} from "../types/type-descriptor.js";
import { parserFrom, type ParseOptions, type ValueArgumentParser } from "./argument-parser.js";

export type ParserPair<T = unknown> = {
  readonly type: TypeDescriptor;
  readonly parser: ValueArgumentParser<T>;
};

/**
 * Lookup table from a target type to the parser able to produce it from a raw
 * token. Nullability is ignored on both keys and queries.
 */
export interface ArgumentContext {
  get(type: TypeDescriptor, types: TypeSystem): ValueArgumentParser | undefined;
  toList(): readonly ParserPair[];
}

const firstCompatible = (
  pairs: readonly ParserPair[],
  type: TypeDescriptor,
  types: TypeSystem,
): ValueArgumentParser | undefined =>
  pairs.find((pair) => types.isSubtypeOrEqual(nonNullOf(type), nonNullOf(pair.type)))
    ?.parser;

export class SimpleArgumentContext implements ArgumentContext {
  readonly #pairs: readonly ParserPair[];

  constructor(pairs: readonly ParserPair[]) {
    this.#pairs = Object.freeze([...pairs]);
  }

  get(type: TypeDescriptor, types: TypeSystem): ValueArgumentParser | undefined {
    const target = nonNullOf(type);
    const exact = this.#pairs.find((pair) =>
      typesAreEqual(nonNullOf(pair.type), target),
    );
    return exact?.parser ?? firstCompatible(this.#pairs, target, types);
  }

  toList(): readonly ParserPair[] {
    return this.#pairs;
  }
}

export const EMPTY_ARGUMENT_CONTEXT: ArgumentContext = new SimpleArgumentContext([]);

const isPairList = (
  value: ArgumentContext | readonly ParserPair[],
): value is readonly ParserPair[] => Array.isArray(value);

/**
 * Layers `overrides` over `base` without touching either. Overrides answer
 * first; base is consulted only when they have nothing for the type.
 */
export const mergeArgumentContexts = (
  base: ArgumentContext,
  overrides: ArgumentContext | readonly ParserPair[],
): ArgumentContext => {
  if (isPairList(overrides)) {
    if (overrides.length === 0) return base;
    if (base === EMPTY_ARGUMENT_CONTEXT) return new SimpleArgumentContext(overrides);
    const pairs = Object.freeze([...overrides]);
    return {
      get: (type, types) => firstCompatible(pairs, type, types) ?? base.get(type, types),
      toList: () => [...pairs, ...base.toList()],
    };
  }

  if (overrides === EMPTY_ARGUMENT_CONTEXT) return base;
  if (base === EMPTY_ARGUMENT_CONTEXT) return overrides;
  return {
    get: (type, types) => overrides.get(type, types) ?? base.get(type, types),
    toList: () => [...overrides.toList(), ...base.toList()],
  };
};

/** Keeps the last registration per key; the result lists the newest first. */
const distinctByReversed = (pairs: readonly ParserPair[]): ParserPair[] => {
  const kept: ParserPair[] = [];
  for (let index = pairs.length - 1; index >= 0; index -= 1) {
    const pair = pairs[index];
    if (!pair) continue;
    if (kept.some((existing) => typesAreEqual(nonNullOf(existing.type), nonNullOf(pair.type)))) {
      continue;
    }
    kept.push(pair);
  }
  return kept;
};

export class ArgumentContextBuilder {
  #pairs: ParserPair[] = [];

  add<T>(type: TypeDescriptor, parser: ValueArgumentParser<T>): this {
    this.#pairs.push({ type, parser });
    return this;
  }

  with<T>(
    type: TypeDescriptor,
    parse: (raw: string, caller: CommandCaller, options: ParseOptions) => T | Promise<T>,
  ): this {
    return this.add(type, parserFrom(parse));
  }

  build(): ArgumentContext {
    return new SimpleArgumentContext(distinctByReversed(this.#pairs));
  }
}

export const buildArgumentContext = (
  configure: (builder: ArgumentContextBuilder) => void,
): ArgumentContext => {
  const builder = new ArgumentContextBuilder();
  configure(builder);
  return builder.build();
};
