import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  CommandTable,
  DiagnosticEmitter,
  DiagnosticError,
  TypeHierarchy,
  arrayOf,
  createSignatureVariant,
  failWith,
  formatSignatureVariant,
  formatTypeName,
  isArrayType,
  nominalType,
  positionalParameter,
  receiverParameter,
  stringConstantParameter,
  type CommandAction,
  type TypeDescriptor,
  type ValueParameter,
} from "@overcall/resolver";

const typeNameSchema = z.string().trim().min(1);

const constantParameterSchema = z
  .object({
    constant: z.string(),
    name: z.string().min(1).optional(),
  })
  .strict();

const positionalParameterSchema = z
  .object({
    name: z.string().min(1),
    type: typeNameSchema,
    optional: z.boolean().default(false),
    vararg: z.boolean().default(false),
  })
  .strict();

const variantSchema = z
  .object({
    receiver: typeNameSchema.optional(),
    description: z.string().optional(),
    parameters: z.array(z.union([constantParameterSchema, positionalParameterSchema])).default([]),
  })
  .strict();

const commandSchema = z
  .object({
    aliases: z.array(z.string().min(1)).default([]),
    variants: z.array(variantSchema).min(1),
  })
  .strict();

export const manifestSchema = z
  .object({
    types: z.record(z.array(typeNameSchema)).default({}),
    commands: z.record(commandSchema),
  })
  .strict();

export type Manifest = z.infer<typeof manifestSchema>;
export type ParameterDeclaration = Manifest["commands"][string]["variants"][number]["parameters"][number];

/** Caller types every manifest can use without declaring them. */
export const BUILTIN_CALLER_TYPES: readonly (readonly [string, readonly string[]])[] = [
  ["Caller", []],
  ["ConsoleCaller", ["Caller"]],
];

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const formatIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;

export const parseManifest = (value: unknown, path: string): Manifest => {
  const parsed = manifestSchema.safeParse(value);
  if (!parsed.success) {
    return failWith({
      code: "CF0001",
      params: { kind: "invalid-manifest", path, issues: parsed.error.issues.map(formatIssue) },
      span: { callee: path, start: 0, end: 0 },
    });
  }
  return parsed.data;
};

export const readManifest = (path: string): Manifest => {
  let value: unknown;
  try {
    value = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    return failWith({
      code: "CF0001",
      params: { kind: "manifest-unreadable", path, message: describeError(error) },
      span: { callee: path, start: 0, end: 0 },
    });
  }
  return parseManifest(value, path);
};

const TYPES_SPAN = { callee: "<types>", start: 0, end: 0 };

/**
 * Parses `Name`, `Name?`, `Array<T>` and `Array<T>?`. Nominal names must be
 * declared in `types`.
 */
export const parseTypeExpression = (text: string, types: TypeHierarchy): TypeDescriptor => {
  const trimmed = text.trim();
  const nullable = trimmed.endsWith("?");
  const body = nullable ? trimmed.slice(0, -1).trimEnd() : trimmed;

  const array = /^Array<(.+)>$/.exec(body);
  if (array?.[1] !== undefined) {
    return arrayOf(parseTypeExpression(array[1], types), { nullable });
  }

  if (!types.has(body)) {
    return failWith({
      code: "TS0001",
      params: { kind: "unknown-type", name: body },
      span: TYPES_SPAN,
    });
  }
  return nominalType(body, { nullable });
};

type Collect = <T>(build: () => T) => T | undefined;

/**
 * Declares manifest types supertypes-first, whatever order the manifest lists
 * them in. Whatever is left once no progress can be made is declared as is so
 * the hierarchy reports the unknown or cyclic supertype.
 */
const declareTypes = (
  types: TypeHierarchy,
  declarations: Record<string, readonly string[]>,
  collect: Collect,
) => {
  const pending = new Map(Object.entries(declarations));
  while (pending.size > 0) {
    const ready = [...pending].filter(([name, supertypes]) =>
      supertypes.every((supertype) => supertype === name || types.has(supertype)),
    );
    const batch = ready.length > 0 ? ready : [...pending].slice(0, 1);
    batch.forEach(([name, supertypes]) => {
      pending.delete(name);
      collect(() => types.declare(name, supertypes.length > 0 ? supertypes : undefined));
    });
  }
};

const buildParameter = (declaration: ParameterDeclaration, types: TypeHierarchy): ValueParameter => {
  if ("constant" in declaration) {
    return stringConstantParameter(declaration.constant, { name: declaration.name });
  }
  const type = parseTypeExpression(declaration.type, types);
  return positionalParameter({
    name: declaration.name,
    type: declaration.vararg && !isArrayType(type) ? arrayOf(type) : type,
    isOptional: declaration.optional,
    isVararg: declaration.vararg,
  });
};

export type CallSummary = {
  command: string;
  signature: string;
  description?: string;
  receiver?: string;
  arguments: readonly unknown[];
};

const summarize =
  (command: string, description: string | undefined): CommandAction =>
  (call) => {
    const summary: CallSummary = {
      command,
      signature: `${call.calleeName}${formatSignatureVariant(call.variant)}`,
      description,
      receiver: call.receiver ? formatTypeName(call.receiver.type) : undefined,
      arguments: call.resolvedValueArguments,
    };
    return summary;
  };

export type Registry = {
  types: TypeHierarchy;
  table: CommandTable;
};

/**
 * Turns a validated manifest into a type hierarchy and a command table. Type,
 * parameter, variant and registration problems are all collected before
 * failing, so one run reports them all.
 */
export const buildRegistry = (manifest: Manifest): Registry => {
  const emitter = new DiagnosticEmitter();
  const collect: Collect = (build) => {
    try {
      return build();
    } catch (error) {
      if (!(error instanceof DiagnosticError)) throw error;
      error.diagnostics.forEach((diagnostic) => emitter.report(diagnostic));
      return undefined;
    }
  };

  const types = TypeHierarchy.withPrimitives();
  BUILTIN_CALLER_TYPES.forEach(([name, supertypes]) => types.declare(name, supertypes));
  declareTypes(types, manifest.types, collect);

  const table = new CommandTable();
  for (const [name, command] of Object.entries(manifest.commands)) {
    const variants = command.variants.flatMap((declaration) => {
      const receiver = declaration.receiver;
      const receiverType = receiver
        ? collect(() => parseTypeExpression(receiver, types))
        : undefined;
      const parameters = declaration.parameters.map((parameter) =>
        collect(() => buildParameter(parameter, types)),
      );
      const built = parameters.filter((parameter): parameter is ValueParameter => !!parameter);
      if ((receiver && !receiverType) || built.length < parameters.length) return [];

      const variant = collect(() =>
        createSignatureVariant({
          receiver: receiverType ? receiverParameter(receiverType) : undefined,
          parameters: built,
          description: declaration.description,
          action: summarize(name, declaration.description),
        }),
      );
      return variant ? [variant] : [];
    });
    collect(() => table.register(name, variants, { aliases: command.aliases }));
  }

  const [first] = emitter.diagnostics;
  if (first) {
    throw new DiagnosticError(first, emitter.diagnostics);
  }
  return { types, table };
};

export const loadRegistry = (path: string): Registry => buildRegistry(readManifest(path));
