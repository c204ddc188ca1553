import type { SourceSpan } from "../diagnostics/index.js";
import type { Associativity, ExposedValue, Listing } from "./interface.js";
import type { CanonicalModuleName } from "./names.js";
import type { RawType } from "./types.js";

export type Pattern =
  | { kind: "var"; name: string }
  | { kind: "anything" }
  | { kind: "literal"; value: string | number | boolean }
  /** `pattern as name` */
  | { kind: "alias"; name: string; pattern: Pattern }
  | { kind: "record"; fields: readonly string[] }
  | { kind: "tuple"; elements: readonly Pattern[] }
  | { kind: "ctor"; name: string; args: readonly Pattern[] };

/**
 * A top-level definition. Only the bound pattern matters while building the
 * environment; bodies are resolved later by the expression canonicalizer.
 */
export interface ValueDef {
  span: SourceSpan;
  pattern: Pattern;
  annotation?: RawType;
}

export interface UnionDecl {
  span: SourceSpan;
  name: string;
  typeParams: readonly string[];
  constructors: readonly { name: string; args: readonly RawType[] }[];
}

export interface AliasDecl {
  span: SourceSpan;
  name: string;
  typeParams: readonly string[];
  body: RawType;
}

export interface LocalInfixDecl {
  span: SourceSpan;
  name: string;
  associativity: Associativity;
  precedence: number;
}

export interface ModuleDecls {
  defs: readonly ValueDef[];
  unions: readonly UnionDecl[];
  aliases: readonly AliasDecl[];
  infixes: readonly LocalInfixDecl[];
}

export interface PortDecl {
  span: SourceSpan;
  name: string;
  type: RawType;
}

export type EffectManagerType = "cmd" | "sub" | "fx";

export type ModuleEffects =
  | { kind: "none" }
  | { kind: "ports"; ports: readonly PortDecl[] }
  | { kind: "manager"; span: SourceSpan; managerType: EffectManagerType };

export interface ImportMethod {
  /** Rename used for qualified access (`import Json.Decode as Decode`). */
  alias?: string;
  listing: Listing<ExposedValue>;
}

export interface ImportDecl {
  span: SourceSpan;
  module: string;
  method: ImportMethod;
}

/**
 * A parsed module that has passed validation. `defaults` are the implicit
 * imports injected before this stage.
 */
export interface ValidModule {
  name: CanonicalModuleName;
  imports: readonly ImportDecl[];
  defaults: readonly ImportDecl[];
  decls: ModuleDecls;
  effects: ModuleEffects;
}
