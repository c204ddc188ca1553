import { normalizeSpan, type SourceSpan } from "../diagnostics/index.js";
import type { AliasEntry, Environment } from "./environment.js";
import type { CanonicalizeError } from "./errors.js";
import {
  canonicalModuleKey,
  displayCanonicalName,
  type CanonicalName,
} from "./names.js";
import { fail, mapResult, ok, traverse, type Result } from "./result.js";
import { nearbyNames, type SuggestionOptions } from "./suggestions.js";
import type { CanonicalRecordField, CanonicalType, RawType } from "./types.js";

type TypeResult = Result<CanonicalType, CanonicalizeError>;

type CanonicalizeTypeContext = {
  env: Environment;
  fallbackSpan: SourceSpan;
  suggestions?: SuggestionOptions;
};

/** Resolves every type name in `type` against `env`. */
export const canonicalizeType = ({
  type,
  ...ctx
}: CanonicalizeTypeContext & { type: RawType }): TypeResult =>
  canonicalize(type, ctx);

const canonicalize = (
  type: RawType,
  ctx: CanonicalizeTypeContext
): TypeResult => {
  switch (type.kind) {
    case "var":
      return ok<CanonicalType>({ kind: "var", name: type.name });

    case "type":
      return canonicalizeReference({
        name: type.name,
        args: [],
        span: normalizeSpan(type.span, ctx.fallbackSpan),
        ctx,
      });

    case "app": {
      if (type.head.kind === "type") {
        return canonicalizeReference({
          name: type.head.name,
          args: type.args,
          span: normalizeSpan(type.span, type.head.span, ctx.fallbackSpan),
          ctx,
        });
      }
      const head = canonicalize(type.head, ctx);
      if (!head.ok) {
        return head;
      }
      return mapResult(canonicalizeAll(type.args, ctx), (args): CanonicalType => ({
        kind: "app",
        head: head.value,
        args,
      }));
    }

    case "lambda": {
      const from = canonicalize(type.from, ctx);
      if (!from.ok) {
        return from;
      }
      return mapResult(canonicalize(type.to, ctx), (to): CanonicalType => ({
        kind: "lambda",
        from: from.value,
        to,
      }));
    }

    case "record": {
      const fields = traverse(
        type.fields,
        (field): Result<CanonicalRecordField, CanonicalizeError> =>
          mapResult(canonicalize(field.type, ctx), (fieldType) => ({
            name: field.name,
            type: fieldType,
          }))
      );
      if (!fields.ok) {
        return fields;
      }
      if (!type.extension) {
        return ok<CanonicalType>({ kind: "record", fields: fields.value });
      }
      return mapResult(canonicalize(type.extension, ctx), (extension): CanonicalType => ({
        kind: "record",
        fields: fields.value,
        extension,
      }));
    }
  }
};

const canonicalizeAll = (
  types: readonly RawType[],
  ctx: CanonicalizeTypeContext
): Result<CanonicalType[], CanonicalizeError> =>
  traverse(types, (type) => canonicalize(type, ctx));

/**
 * Declarations of the module being compiled shadow imported types of the
 * same name; imports only compete with each other.
 */
const preferLocal = (
  env: Environment,
  unions: readonly CanonicalName[],
  aliases: readonly AliasEntry[]
): { unions: readonly CanonicalName[]; aliases: readonly AliasEntry[] } => {
  const homeKey = canonicalModuleKey(env.home);
  const isLocal = (name: CanonicalName) =>
    name.home.kind !== "builtin" &&
    canonicalModuleKey(name.home.module) === homeKey;

  const localUnions = unions.filter(isLocal);
  const localAliases = aliases.filter((alias) => isLocal(alias.name));
  return localUnions.length + localAliases.length > 0
    ? { unions: localUnions, aliases: localAliases }
    : { unions, aliases };
};

const canonicalizeReference = ({
  name,
  args,
  span,
  ctx,
}: {
  name: string;
  args: readonly RawType[];
  span: SourceSpan;
  ctx: CanonicalizeTypeContext;
}): TypeResult => {
  const { unions, aliases } = preferLocal(
    ctx.env,
    ctx.env.unions.get(name),
    ctx.env.aliases.get(name)
  );

  if (unions.length + aliases.length > 1) {
    return fail<CanonicalizeError>({
      kind: "ambiguous-type",
      span,
      name,
      candidates: [
        ...unions.map(displayCanonicalName),
        ...aliases.map((alias) => displayCanonicalName(alias.name)),
      ],
    });
  }

  const [union] = unions;
  if (union) {
    if (args.length === 0) {
      return ok<CanonicalType>({ kind: "type", name: union });
    }
    return mapResult(canonicalizeAll(args, ctx), (canonicalArgs): CanonicalType => ({
      kind: "app",
      head: { kind: "type", name: union },
      args: canonicalArgs,
    }));
  }

  const [alias] = aliases;
  if (!alias) {
    return fail<CanonicalizeError>({
      kind: "type-not-found",
      span,
      name,
      suggestions: nearbyNames(
        name,
        [...ctx.env.unions.names(), ...ctx.env.aliases.names()],
        ctx.suggestions
      ),
    });
  }

  if (alias.typeParams.length !== args.length) {
    return fail<CanonicalizeError>({
      kind: "alias-arity-mismatch",
      span,
      name,
      expected: alias.typeParams.length,
      actual: args.length,
    });
  }

  return mapResult(canonicalizeAll(args, ctx), (canonicalArgs): CanonicalType => ({
    kind: "aliased",
    name: alias.name,
    args: alias.typeParams.map((param, index) => ({
      param,
      type: canonicalArgs[index] ?? { kind: "var", name: param },
    })),
    body: alias.body,
  }));
};
