/**
 * A module's identity across the whole program: the package that owns it
 * plus its dotted module name (`List`, `Json.Decode`).
 */
export interface CanonicalModuleName {
  package: string;
  module: string;
}

export type SymbolHome =
  | { kind: "builtin" }
  | { kind: "module"; module: CanonicalModuleName }
  | { kind: "top-level"; module: CanonicalModuleName };

/** The permanent identity of a resolved symbol. */
export interface CanonicalName {
  home: SymbolHome;
  name: string;
}

const NATIVE_MODULE_PREFIX = "Native.";

export const canonicalModuleKey = (name: CanonicalModuleName): string =>
  `${name.package}::${name.module}`;

export const builtinName = (name: string): CanonicalName => ({
  home: { kind: "builtin" },
  name,
});

/** Fully namespaced reference into `module`. */
export const fromModule = (
  module: CanonicalModuleName,
  name: string
): CanonicalName => ({ home: { kind: "module", module }, name });

/** A top-level declaration of the module currently being compiled. */
export const topLevel = (
  module: CanonicalModuleName,
  name: string
): CanonicalName => ({ home: { kind: "top-level", module }, name });

export const isNativeModule = (rawName: string): boolean =>
  rawName.startsWith(NATIVE_MODULE_PREFIX);

export const symbolHomeKey = (home: SymbolHome): string => {
  switch (home.kind) {
    case "builtin":
      return "builtin";
    case "module":
      return `module:${canonicalModuleKey(home.module)}`;
    case "top-level":
      return `top-level:${canonicalModuleKey(home.module)}`;
  }
};

export const canonicalNameKey = (name: CanonicalName): string =>
  `${symbolHomeKey(name.home)}#${name.name}`;

export const displayCanonicalName = (name: CanonicalName): string =>
  name.home.kind === "builtin"
    ? name.name
    : `${name.home.module.module}.${name.name}`;
