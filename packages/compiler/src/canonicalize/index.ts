export * from "./ast.js";
export * from "./builtins.js";
export * from "./environment.js";
export * from "./errors.js";
export * from "./interface.js";
export * from "./names.js";
export * from "./result.js";
export * from "./types.js";
export { addTypeAliases, aliasToNode, typeReferences, type AliasNode } from "./alias-graph.js";
export { canonicalizeType } from "./canonicalize-type.js";
export { boundNames, declsToPatches } from "./decl-patches.js";
export { effectsToPatches } from "./effect-patches.js";
export { importToPatches, interfaceToPatches, type ImportDict } from "./import-patches.js";
export { restrictToPublicApi } from "./restrict.js";
export { buildEnvironment, type BuildEnvironmentOptions } from "./setup.js";
export { levenshteinDistance, nearbyNames, type SuggestionOptions } from "./suggestions.js";
export { exposedValueToPatches } from "./value-patches.js";
