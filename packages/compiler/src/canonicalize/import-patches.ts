import type { ImportDecl } from "./ast.js";
import {
  aliasPatch,
  infixPatch,
  patternPatch,
  unionPatch,
  valuePatch,
  type Patch,
} from "./environment.js";
import type { CanonicalizeError } from "./errors.js";
import type { ModuleInterface, ModuleInterfaces } from "./interface.js";
import {
  canonicalModuleKey,
  fromModule,
  isNativeModule,
  type CanonicalModuleName,
} from "./names.js";
import { restrictToPublicApi } from "./restrict.js";
import { fail, mapResult, ok, traverseConcat, type Result } from "./result.js";
import { nearbyNames, type SuggestionOptions } from "./suggestions.js";
import { exposedValueToPatches } from "./value-patches.js";

/** Maps module names as written in imports to their canonical names. */
export type ImportDict = ReadonlyMap<string, CanonicalModuleName>;

/**
 * Every exported name of `iface` as a patch, each short name prefixed with
 * `prefix` (`""` for unqualified access, `"List."` for qualified access).
 */
export const interfaceToPatches = ({
  moduleName,
  prefix,
  iface,
}: {
  moduleName: CanonicalModuleName;
  prefix: string;
  iface: ModuleInterface;
}): Patch[] => {
  const ctors = Array.from(iface.unions.values()).flatMap(
    (union) => union.constructors
  );

  return [
    ...Array.from(iface.types.keys()).map((name) =>
      valuePatch(prefix + name, fromModule(moduleName, name))
    ),
    ...ctors.map((ctor) =>
      valuePatch(prefix + ctor.name, fromModule(moduleName, ctor.name))
    ),
    ...Array.from(iface.unions.keys()).map((name) =>
      unionPatch(prefix + name, fromModule(moduleName, name))
    ),
    ...Array.from(iface.aliases.entries()).map(([name, alias]) =>
      aliasPatch(prefix + name, {
        name: fromModule(moduleName, name),
        typeParams: alias.typeParams,
        body: alias.body,
      })
    ),
    ...ctors.map((ctor) =>
      patternPatch(
        prefix + ctor.name,
        fromModule(moduleName, ctor.name),
        ctor.args.length
      )
    ),
  ];
};

const lookupInterface = ({
  importDict,
  interfaces,
  rawName,
}: {
  importDict: ImportDict;
  interfaces: ModuleInterfaces;
  rawName: string;
}): { moduleName: CanonicalModuleName; iface: ModuleInterface } | undefined => {
  const moduleName = importDict.get(rawName);
  if (!moduleName) {
    return undefined;
  }
  const iface = interfaces.get(canonicalModuleKey(moduleName));
  return iface ? { moduleName, iface: restrictToPublicApi(iface) } : undefined;
};

/**
 * Patches contributed by one import: the imported module's operators, every
 * export under its qualifier, and the unqualified names its listing exposes.
 */
export const importToPatches = ({
  importDict,
  interfaces,
  importDecl,
  suggestions,
}: {
  importDict: ImportDict;
  interfaces: ModuleInterfaces;
  importDecl: ImportDecl;
  suggestions?: SuggestionOptions;
}): Result<Patch[], CanonicalizeError> => {
  const { span, module: rawName, method } = importDecl;
  const found = lookupInterface({ importDict, interfaces, rawName });

  if (!found) {
    if (isNativeModule(rawName)) {
      return ok([]);
    }
    return fail<CanonicalizeError>({
      kind: "module-not-found",
      span,
      requested: rawName,
      suggestions: nearbyNames(
        rawName,
        Array.from(interfaces.values()).map((iface) => iface.module.module),
        suggestions
      ),
    });
  }

  const { moduleName, iface } = found;
  const qualifier = method.alias ?? rawName;

  const infixPatches = iface.fixities.map((fixity) =>
    infixPatch({
      name: fromModule(moduleName, fixity.name),
      associativity: fixity.associativity,
      precedence: fixity.precedence,
    })
  );

  const qualifiedPatches = interfaceToPatches({
    moduleName,
    prefix: `${qualifier}.`,
    iface,
  });

  const { listing } = method;
  const unqualifiedPatches: Result<Patch[], CanonicalizeError> = listing.open
    ? ok(interfaceToPatches({ moduleName, prefix: "", iface }))
    : traverseConcat(listing.values, (value) =>
        exposedValueToPatches({ span, moduleName, iface, value, suggestions })
      );

  return mapResult(unqualifiedPatches, (patches) => [
    ...infixPatches,
    ...qualifiedPatches,
    ...patches,
  ]);
};
