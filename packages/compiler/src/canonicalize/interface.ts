import type { CanonicalModuleName } from "./names.js";
import type { CanonicalType } from "./types.js";

/** Either everything (`open`) or the explicit `values`. */
export interface Listing<T> {
  values: readonly T[];
  open: boolean;
}

export type ExposedValue =
  | { kind: "value"; name: string }
  | { kind: "alias"; name: string }
  | { kind: "union"; name: string; constructors: Listing<string> };

export type Associativity = "left" | "right" | "non";

export interface InfixDecl {
  name: string;
  associativity: Associativity;
  precedence: number;
}

export interface UnionConstructor {
  name: string;
  args: readonly CanonicalType[];
}

export interface UnionInfo {
  typeParams: readonly string[];
  constructors: readonly UnionConstructor[];
}

export interface AliasInfo {
  typeParams: readonly string[];
  body: CanonicalType;
}

/**
 * The compiled public surface of a module. `types` holds every typed value,
 * union constructors included.
 */
export interface ModuleInterface {
  module: CanonicalModuleName;
  exports: readonly ExposedValue[];
  types: ReadonlyMap<string, CanonicalType>;
  unions: ReadonlyMap<string, UnionInfo>;
  aliases: ReadonlyMap<string, AliasInfo>;
  fixities: readonly InfixDecl[];
}

/** Interfaces keyed by `canonicalModuleKey`. */
export type ModuleInterfaces = ReadonlyMap<string, ModuleInterface>;

export const exposedValueNames = (exports: readonly ExposedValue[]): string[] =>
  exports.flatMap((entry) => (entry.kind === "value" ? [entry.name] : []));

export const exposedAliasNames = (exports: readonly ExposedValue[]): string[] =>
  exports.flatMap((entry) => (entry.kind === "alias" ? [entry.name] : []));

export const exposedUnions = (
  exports: readonly ExposedValue[]
): { name: string; constructors: Listing<string> }[] =>
  exports.flatMap((entry) =>
    entry.kind === "union"
      ? [{ name: entry.name, constructors: entry.constructors }]
      : []
  );
