import { failWith, wholeCallSpan } from "../diagnostics/index.js";
import { ANY_TYPE, PRIMITIVE_TYPES } from "./primitives.js";
import type { TypeDescriptor, TypeSystem } from "./type-descriptor.js";

const TYPES_SPAN = wholeCallSpan("<types>", 0);

/**
 * Nominal type hierarchy with a single top type `Any`.
 *
 * Non-null `T` is a subtype of `T?`, never the reverse. Arrays are covariant
 * in their element type. Names that were never declared are only related to
 * themselves and to `Any`.
 */
export class TypeHierarchy implements TypeSystem {
  #supertypes = new Map<string, readonly string[]>([[ANY_TYPE.name, []]]);

  static withPrimitives(): TypeHierarchy {
    const hierarchy = new TypeHierarchy();
    PRIMITIVE_TYPES.forEach((type) => hierarchy.declare(type.name));
    return hierarchy;
  }

  declare(name: string, supertypes: readonly string[] = [ANY_TYPE.name]): this {
    if (this.#supertypes.has(name)) {
      return failWith({
        code: "TS0001",
        params: { kind: "duplicate-type", name },
        span: TYPES_SPAN,
      });
    }

    supertypes.forEach((supertype) => {
      if (supertype === name) {
        failWith({
          code: "TS0001",
          params: { kind: "cyclic-hierarchy", name },
          span: TYPES_SPAN,
        });
      }
      if (!this.#supertypes.has(supertype)) {
        failWith({
          code: "TS0001",
          params: { kind: "unknown-supertype", name, supertype },
          span: TYPES_SPAN,
        });
      }
    });

    this.#supertypes.set(
      name,
      supertypes.length > 0 ? [...supertypes] : [ANY_TYPE.name],
    );
    return this;
  }

  has(name: string): boolean {
    return this.#supertypes.has(name);
  }

  /** Declared names, in declaration order. */
  names(): string[] {
    return [...this.#supertypes.keys()];
  }

  isSubtypeOrEqual(actual: TypeDescriptor, expected: TypeDescriptor): boolean {
    if (actual.nullable && !expected.nullable) return false;
    if (expected.kind === "nominal" && expected.name === ANY_TYPE.name) {
      return true;
    }

    if (actual.kind === "array" && expected.kind === "array") {
      return this.isSubtypeOrEqual(actual.element, expected.element);
    }

    if (actual.kind === "nominal" && expected.kind === "nominal") {
      return this.#extends(actual.name, expected.name);
    }

    return false;
  }

  #extends(name: string, ancestor: string): boolean {
    if (name === ancestor) return true;

    const seen = new Set<string>();
    const queue = [name];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      for (const parent of this.#supertypes.get(current) ?? []) {
        if (parent === ancestor) return true;
        queue.push(parent);
      }
    }
    return false;
  }
}
