/**
 * Structural identity of an argument or parameter type. Descriptors are plain
 * immutable values built when a variant is declared; the engine never
 * inspects live functions to discover them.
 */
export type NominalType = {
  readonly kind: "nominal";
  readonly name: string;
  readonly nullable: boolean;
};

/** `Array<T>` wrapper, used by vararg parameters. */
export type ArrayType = {
  readonly kind: "array";
  readonly element: TypeDescriptor;
  readonly nullable: boolean;
};

export type TypeDescriptor = NominalType | ArrayType;

/**
 * The host's subtype relation. Must be reflexive and transitive; it is the
 * only type algebra the resolver relies on.
 */
export interface TypeSystem {
  isSubtypeOrEqual(actual: TypeDescriptor, expected: TypeDescriptor): boolean;
}

export const nominalType = (
  name: string,
  { nullable = false }: { nullable?: boolean } = {},
): NominalType => Object.freeze({ kind: "nominal", name, nullable });

export const arrayOf = (
  element: TypeDescriptor,
  { nullable = false }: { nullable?: boolean } = {},
): ArrayType => Object.freeze({ kind: "array", element, nullable });

export const nullableOf = (type: TypeDescriptor): TypeDescriptor =>
  type.nullable ? type : Object.freeze({ ...type, nullable: true });

export const nonNullOf = (type: TypeDescriptor): TypeDescriptor =>
  type.nullable ? Object.freeze({ ...type, nullable: false }) : type;

export const isArrayType = (type: TypeDescriptor): type is ArrayType =>
  type.kind === "array";

/** Element type of a vararg array descriptor; non-array types unwrap to themselves. */
export const elementTypeOf = (type: TypeDescriptor): TypeDescriptor =>
  type.kind === "array" ? type.element : type;

export const typesAreEqual = (a: TypeDescriptor, b: TypeDescriptor): boolean => {
  if (a === b) return true;
  if (a.nullable !== b.nullable) return false;
  if (a.kind === "nominal" && b.kind === "nominal") return a.name === b.name;
  if (a.kind === "array" && b.kind === "array") {
    return typesAreEqual(a.element, b.element);
  }
  return false;
};
