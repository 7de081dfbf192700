import { failWith } from "../diagnostics/index.js";
import type { SignatureVariant } from "../descriptor/signature-variant.js";

export type RegisteredCommand = {
  readonly primaryName: string;
  readonly aliases: readonly string[];
  readonly variants: readonly SignatureVariant[];
};

/** Overload sets keyed by command name, with aliases resolving to the same entry. */
export class CommandTable {
  #commands = new Map<string, RegisteredCommand>();
  #byName = new Map<string, RegisteredCommand>();

  register(
    name: string,
    variants: readonly SignatureVariant[],
    { aliases = [] }: { aliases?: readonly string[] } = {},
  ): RegisteredCommand {
    const span = { callee: name, start: 0, end: 0 };
    if (this.#byName.has(name)) {
      return failWith({
        code: "CM0001",
        params: { kind: "duplicate-command", name },
        span,
      });
    }
    for (const alias of aliases) {
      const owner = this.#byName.get(alias);
      if (owner || alias === name) {
        return failWith({
          code: "CM0001",
          params: { kind: "duplicate-alias", alias, owner: owner?.primaryName ?? name },
          span,
        });
      }
    }

    const command: RegisteredCommand = Object.freeze({
      primaryName: name,
      aliases: Object.freeze([...aliases]),
      variants: Object.freeze([...variants]),
    });
    this.#commands.set(name, command);
    this.#byName.set(name, command);
    aliases.forEach((alias) => this.#byName.set(alias, command));
    return command;
  }

  lookup(name: string): RegisteredCommand | undefined {
    return this.#byName.get(name);
  }

  /** Registered commands in registration order. */
  get commands(): RegisteredCommand[] {
    return [...this.#commands.values()];
  }
}
