import type { SourceSpan } from "../diagnostics/index.js";
import {
  aliasPatch,
  patternPatch,
  unionPatch,
  valuePatch,
  type Patch,
} from "./environment.js";
import type { CanonicalizeError } from "./errors.js";
import {
  exposedAliasNames,
  exposedUnions,
  exposedValueNames,
  type ExposedValue,
  type ModuleInterface,
} from "./interface.js";
import { fromModule, type CanonicalModuleName } from "./names.js";
import { fail, mapResult, ok, traverse, type Result } from "./result.js";
import { nearbyNames, type SuggestionOptions } from "./suggestions.js";

interface ExposedCtor {
  name: string;
  arity: number;
}

/**
 * Resolves one entry of an explicit import list against a restricted
 * interface. Every patch points at a name the interface provably exposes.
 */
export const exposedValueToPatches = ({
  span,
  moduleName,
  iface,
  value,
  suggestions,
}: {
  span: SourceSpan;
  moduleName: CanonicalModuleName;
  iface: ModuleInterface;
  value: ExposedValue;
  suggestions?: SuggestionOptions;
}): Result<Patch[], CanonicalizeError> => {
  const notFoundAmong = <T>(
    name: string,
    candidates: readonly string[]
  ): Result<T, CanonicalizeError> =>
    fail<CanonicalizeError>({
      kind: "value-not-found",
      span,
      moduleName: moduleName.module,
      name,
      suggestions: nearbyNames(name, candidates, suggestions),
    });
  const notFound = notFoundAmong<Patch[]>;

  switch (value.kind) {
    case "value":
      return iface.types.has(value.name)
        ? ok([valuePatch(value.name, fromModule(moduleName, value.name))])
        : notFound(value.name, exposedValueNames(iface.exports));

    case "alias": {
      const alias = iface.aliases.get(value.name);
      if (alias) {
        const patches = [
          aliasPatch(value.name, {
            name: fromModule(moduleName, value.name),
            typeParams: alias.typeParams,
            body: alias.body,
          }),
        ];
        // Record aliases double as their constructor function.
        if (iface.types.has(value.name)) {
          patches.push(valuePatch(value.name, fromModule(moduleName, value.name)));
        }
        return ok(patches);
      }

      if (iface.unions.has(value.name)) {
        return ok([unionPatch(value.name, fromModule(moduleName, value.name))]);
      }

      return notFound(value.name, [
        ...exposedAliasNames(iface.exports),
        ...exposedUnions(iface.exports).map((union) => union.name),
      ]);
    }

    case "union": {
      const union = iface.unions.get(value.name);
      if (!union) {
        return notFound(
          value.name,
          exposedUnions(iface.exports).map((entry) => entry.name)
        );
      }

      const realCtors = union.constructors.map((ctor): ExposedCtor => ({
        name: ctor.name,
        arity: ctor.args.length,
      }));
      const realCtorArity = new Map(
        realCtors.map((ctor) => [ctor.name, ctor.arity] as const)
      );

      const ctorExists = (
        ctorName: string
      ): Result<ExposedCtor, CanonicalizeError> => {
        const arity = realCtorArity.get(ctorName);
        return arity === undefined
          ? notFoundAmong<ExposedCtor>(
              ctorName,
              realCtors.map((ctor) => ctor.name)
            )
          : ok({ name: ctorName, arity });
      };

      const accepted: Result<ExposedCtor[], CanonicalizeError> =
        value.constructors.open
          ? ok(realCtors)
          : traverse(value.constructors.values, ctorExists);

      return mapResult(accepted, (ctors) => [
        unionPatch(value.name, fromModule(moduleName, value.name)),
        ...ctors.map((ctor) =>
          valuePatch(ctor.name, fromModule(moduleName, ctor.name))
        ),
        ...ctors.map((ctor) =>
          patternPatch(ctor.name, fromModule(moduleName, ctor.name), ctor.arity)
        ),
      ]);
    }
  }
};
