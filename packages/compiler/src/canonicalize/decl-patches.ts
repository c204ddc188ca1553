import type { ModuleDecls, Pattern } from "./ast.js";
import { aliasToNode, type AliasNode } from "./alias-graph.js";
import {
  infixPatch,
  patternPatch,
  unionPatch,
  valuePatch,
  type Patch,
} from "./environment.js";
import { fromModule, topLevel, type CanonicalModuleName } from "./names.js";

/** Names a pattern binds, in source order. */
export const boundNames = (pattern: Pattern): string[] => {
  switch (pattern.kind) {
    case "var":
      return [pattern.name];
    case "anything":
    case "literal":
      return [];
    case "alias":
      return [pattern.name, ...boundNames(pattern.pattern)];
    case "record":
      return [...pattern.fields];
    case "tuple":
      return pattern.elements.flatMap(boundNames);
    case "ctor":
      return pattern.args.flatMap(boundNames);
  }
};

/**
 * Patches for the module's own declarations, plus one graph node per local
 * alias for the alias resolver.
 *
 * Union and alias names, and constructor patterns, are fully namespaced;
 * values defined at the top level (constructors included) are top-level.
 */
export const declsToPatches = ({
  moduleName,
  decls,
}: {
  moduleName: CanonicalModuleName;
  decls: ModuleDecls;
}): { aliasNodes: AliasNode[]; patches: Patch[] } => {
  const topLevelValue = (name: string) =>
    valuePatch(name, topLevel(moduleName, name));

  const infixPatches = decls.infixes.map((infix) =>
    infixPatch({
      name: topLevel(moduleName, infix.name),
      associativity: infix.associativity,
      precedence: infix.precedence,
    })
  );

  // Only closed records get an implicit constructor function.
  const recordConstructorPatches = decls.aliases.flatMap((alias) =>
    alias.body.kind === "record" && !alias.body.extension
      ? [topLevelValue(alias.name)]
      : []
  );

  const unionPatches = decls.unions.flatMap((union) => [
    unionPatch(union.name, fromModule(moduleName, union.name)),
    ...union.constructors.map((ctor) => topLevelValue(ctor.name)),
    ...union.constructors.map((ctor) =>
      patternPatch(ctor.name, fromModule(moduleName, ctor.name), ctor.args.length)
    ),
  ]);

  const defPatches = decls.defs.flatMap((def) =>
    boundNames(def.pattern).map(topLevelValue)
  );

  return {
    aliasNodes: decls.aliases.map(aliasToNode),
    patches: [
      ...infixPatches,
      ...recordConstructorPatches,
      ...unionPatches,
      ...defPatches,
    ],
  };
};
