import type { SourceSpan } from "../../diagnostics/index.js";
import type { ImportDecl, ValidModule } from "../ast.js";
import type {
  AliasInfo,
  ExposedValue,
  InfixDecl,
  ModuleInterface,
  UnionInfo,
} from "../interface.js";
import {
  builtinName,
  canonicalModuleKey,
  fromModule,
  type CanonicalModuleName,
} from "../names.js";
import type { CanonicalType, RawType } from "../types.js";

export const span = (start: number, end = start + 1): SourceSpan => ({
  file: "src/Main.ald",
  start,
  end,
});

export const coreModule = (module: string): CanonicalModuleName => ({
  package: "alder/core",
  module,
});

export const MAIN: CanonicalModuleName = { package: "user/app", module: "Main" };

export const INT: CanonicalType = { kind: "type", name: builtinName("Int") };

export const fn = (...types: CanonicalType[]): CanonicalType =>
  types.reduceRight((to, from) => ({ kind: "lambda", from, to }));

export const rawType = (name: string): RawType => ({ kind: "type", name });

export const rawVar = (name: string): RawType => ({ kind: "var", name });

export const makeInterface = ({
  module,
  exports,
  types = {},
  unions = {},
  aliases = {},
  fixities = [],
}: {
  module: CanonicalModuleName;
  exports: ExposedValue[];
  types?: Record<string, CanonicalType>;
  unions?: Record<string, UnionInfo>;
  aliases?: Record<string, AliasInfo>;
  fixities?: InfixDecl[];
}): ModuleInterface => ({
  module,
  exports,
  types: new Map(Object.entries(types)),
  unions: new Map(Object.entries(unions)),
  aliases: new Map(Object.entries(aliases)),
  fixities,
});

export const ARITH = coreModule("Arith");
export const COLORS = coreModule("Colors");

/** `add`, `sub` and `(+)` exported; `secret` is private. */
export const arithInterface = makeInterface({
  module: ARITH,
  exports: [
    { kind: "value", name: "add" },
    { kind: "value", name: "sub" },
  ],
  types: {
    add: fn(INT, INT, INT),
    sub: fn(INT, INT, INT),
    secret: INT,
  },
  fixities: [{ name: "+", associativity: "left", precedence: 6 }],
});

const colorType: CanonicalType = { kind: "type", name: fromModule(COLORS, "Color") };

const pointBody: CanonicalType = {
  kind: "record",
  fields: [
    { name: "x", type: INT },
    { name: "y", type: INT },
  ],
};

/**
 * `Color = Red | Green | Blue` exposed as `Color(Red, Green)`, the record
 * alias `Point` with its constructor, the plain alias `Name`, and a private
 * union `Shade`.
 */
export const colorsInterface = makeInterface({
  module: COLORS,
  exports: [
    {
      kind: "union",
      name: "Color",
      constructors: { values: ["Red", "Green"], open: false },
    },
    { kind: "alias", name: "Point" },
    { kind: "value", name: "Point" },
    { kind: "alias", name: "Name" },
    { kind: "value", name: "toName" },
  ],
  types: {
    Red: colorType,
    Green: colorType,
    Blue: colorType,
    Point: fn(INT, INT, { kind: "type", name: fromModule(COLORS, "Point") }),
    toName: fn(colorType, { kind: "type", name: builtinName("String") }),
  },
  unions: {
    Color: {
      typeParams: [],
      constructors: [
        { name: "Red", args: [] },
        { name: "Green", args: [] },
        { name: "Blue", args: [] },
      ],
    },
    Shade: {
      typeParams: ["a"],
      constructors: [{ name: "Shade", args: [{ kind: "var", name: "a" }] }],
    },
  },
  aliases: {
    Point: { typeParams: [], body: pointBody },
    Name: {
      typeParams: [],
      body: { kind: "type", name: builtinName("String") },
    },
  },
});

export const interfaceTable = (
  ...interfaces: ModuleInterface[]
): Map<string, ModuleInterface> =>
  new Map(interfaces.map((iface) => [canonicalModuleKey(iface.module), iface]));

export const importDictFor = (
  ...modules: CanonicalModuleName[]
): Map<string, CanonicalModuleName> =>
  new Map(modules.map((module) => [module.module, module]));

export const openImport = (
  module: string,
  at: number,
  alias?: string
): ImportDecl => ({
  span: span(at),
  module,
  method: { alias, listing: { values: [], open: true } },
});

export const explicitImport = (
  module: string,
  at: number,
  values: ExposedValue[]
): ImportDecl => ({
  span: span(at),
  module,
  method: { listing: { values, open: false } },
});

export const emptyModule = (
  overrides: Partial<ValidModule> = {}
): ValidModule => ({
  name: MAIN,
  imports: [],
  defaults: [],
  decls: { defs: [], unions: [], aliases: [], infixes: [] },
  effects: { kind: "none" },
  ...overrides,
});
