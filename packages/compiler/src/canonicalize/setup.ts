import {
  countCompilerPerf,
  createCompilerPerfRecord,
  logEnvironmentPerfSummary,
  measureCompilerPhase,
} from "../perf.js";
import { addTypeAliases } from "./alias-graph.js";
import type { ValidModule } from "./ast.js";
import { BUILTIN_PATCHES } from "./builtins.js";
import { declsToPatches } from "./decl-patches.js";
import { effectsToPatches } from "./effect-patches.js";
import {
  environmentFromPatches,
  type Environment,
  type Patch,
} from "./environment.js";
import type { CanonicalizeError } from "./errors.js";
import { importToPatches, type ImportDict } from "./import-patches.js";
import type { ModuleInterfaces } from "./interface.js";
import { canonicalModuleKey } from "./names.js";
import { traverse, type Result } from "./result.js";
import type { SuggestionOptions } from "./suggestions.js";

export interface BuildEnvironmentOptions {
  /** Module names as written in imports, mapped to canonical names. */
  importDict: ImportDict;
  interfaces: ModuleInterfaces;
  module: ValidModule;
  /** Names visible in every module. Defaults to `BUILTIN_PATCHES`. */
  builtins?: readonly Patch[];
  suggestions?: SuggestionOptions;
}

/**
 * Builds the canonical environment of one module: builtins, the module's own
 * declarations, effect bindings and every import are folded into a fresh
 * environment, then local type aliases are resolved into it.
 *
 * Fails fast on the first missing module, missing import-list entry or alias
 * cycle. No partial environment is returned on failure.
 */
export const buildEnvironment = ({
  importDict,
  interfaces,
  module,
  builtins = BUILTIN_PATCHES,
  suggestions,
}: BuildEnvironmentOptions): Result<Environment, CanonicalizeError> => {
  const perf = createCompilerPerfRecord();
  const finish = (
    result: Result<Environment, CanonicalizeError>
  ): Result<Environment, CanonicalizeError> => {
    logEnvironmentPerfSummary({
      record: perf,
      module: canonicalModuleKey(module.name),
      success: result.ok,
      diagnostics: result.ok ? 0 : 1,
    });
    return result;
  };

  const allImports = [...module.imports, ...module.defaults];
  countCompilerPerf(perf, "canonicalize.imports", allImports.length);

  const importPatches = measureCompilerPhase(perf, "imports", () =>
    traverse(allImports, (importDecl) =>
      importToPatches({ importDict, interfaces, importDecl, suggestions })
    )
  );
  if (!importPatches.ok) {
    return finish(importPatches);
  }

  const { aliasNodes, patches: declPatches } = measureCompilerPhase(
    perf,
    "declarations",
    () => declsToPatches({ moduleName: module.name, decls: module.decls })
  );
  const effectPatches = effectsToPatches({
    moduleName: module.name,
    effects: module.effects,
  });

  const patches = [
    ...builtins,
    ...declPatches,
    ...effectPatches,
    ...importPatches.value.flat(),
  ];
  countCompilerPerf(perf, "canonicalize.patches", patches.length);

  const env = measureCompilerPhase(perf, "patches", () =>
    environmentFromPatches(module.name, patches)
  );

  countCompilerPerf(perf, "canonicalize.aliases", aliasNodes.length);
  return finish(
    measureCompilerPhase(perf, "aliases", () =>
      addTypeAliases({
        moduleName: module.name,
        nodes: aliasNodes,
        env,
        suggestions,
      })
    )
  );
};
