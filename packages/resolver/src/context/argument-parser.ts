import type { CommandCaller } from "../call/command-call.js";

export type ParseOptions = {
  signal?: AbortSignal;
};

/**
 * Converts a raw textual argument into a value of the type it is registered
 * for. Parsers reject input by throwing, usually through `illegalArgument`.
 */
export interface ValueArgumentParser<T = unknown> {
  parse(raw: string, caller: CommandCaller, options: ParseOptions): T | Promise<T>;
}

export class ArgumentParserError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArgumentParserError";
  }
}

export const illegalArgument = (message: string, cause?: unknown): never => {
  throw new ArgumentParserError(message, { cause });
};

export const parserFrom = <T>(
  parse: (raw: string, caller: CommandCaller, options: ParseOptions) => T | Promise<T>,
): ValueArgumentParser<T> => ({ parse });
