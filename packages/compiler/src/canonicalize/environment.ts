import type { Associativity } from "./interface.js";
import {
  canonicalNameKey,
  type CanonicalModuleName,
  type CanonicalName,
} from "./names.js";
import type { CanonicalType } from "./types.js";

export interface AliasEntry {
  name: CanonicalName;
  typeParams: readonly string[];
  body: CanonicalType;
}

export interface PatternEntry {
  name: CanonicalName;
  arity: number;
}

export interface InfixEntry {
  name: CanonicalName;
  associativity: Associativity;
  precedence: number;
}

/** A single fact introducing one short name into one namespace. */
export type Patch =
  | { kind: "value"; name: string; target: CanonicalName }
  | { kind: "union"; name: string; target: CanonicalName }
  | { kind: "alias"; name: string; entry: AliasEntry }
  | { kind: "pattern"; name: string; entry: PatternEntry }
  /** Infix operators are keyed by the operator's own short name. */
  | { kind: "infix"; entry: InfixEntry };

/**
 * Short name to candidate list. Candidates keep insertion order and are
 * de-duplicated by `keyOf`; ambiguity is left for the consumer to report.
 */
export class Namespace<T> {
  readonly #entries = new Map<string, T[]>();
  readonly #keys = new Map<string, Set<string>>();
  readonly #keyOf: (candidate: T) => string;

  constructor(keyOf: (candidate: T) => string) {
    this.#keyOf = keyOf;
  }

  add(name: string, candidate: T): void {
    const key = this.#keyOf(candidate);
    const keys = this.#keys.get(name) ?? new Set<string>();
    if (keys.has(key)) {
      return;
    }
    keys.add(key);
    this.#keys.set(name, keys);
    const candidates = this.#entries.get(name) ?? [];
    candidates.push(candidate);
    this.#entries.set(name, candidates);
  }

  get(name: string): readonly T[] {
    return this.#entries.get(name) ?? [];
  }

  has(name: string): boolean {
    return this.#entries.has(name);
  }

  names(): string[] {
    return Array.from(this.#entries.keys());
  }

  entries(): [string, readonly T[]][] {
    return Array.from(this.#entries.entries());
  }

  get size(): number {
    return this.#entries.size;
  }
}

export type ReadonlyNamespace<T> = Pick<
  Namespace<T>,
  "get" | "has" | "names" | "entries" | "size"
>;

/** The canonical environment of one module. */
export interface Environment {
  home: CanonicalModuleName;
  values: ReadonlyNamespace<CanonicalName>;
  unions: ReadonlyNamespace<CanonicalName>;
  aliases: ReadonlyNamespace<AliasEntry>;
  patterns: ReadonlyNamespace<PatternEntry>;
  infixes: ReadonlyNamespace<InfixEntry>;
}

/** The environment while it is being assembled. */
export interface MutableEnvironment extends Environment {
  values: Namespace<CanonicalName>;
  unions: Namespace<CanonicalName>;
  aliases: Namespace<AliasEntry>;
  patterns: Namespace<PatternEntry>;
  infixes: Namespace<InfixEntry>;
}

export const createEnvironment = (
  home: CanonicalModuleName
): MutableEnvironment => ({
  home,
  values: new Namespace(canonicalNameKey),
  unions: new Namespace(canonicalNameKey),
  aliases: new Namespace((entry) => canonicalNameKey(entry.name)),
  patterns: new Namespace(
    (entry) => `${canonicalNameKey(entry.name)}/${entry.arity}`
  ),
  infixes: new Namespace(
    (entry) =>
      `${canonicalNameKey(entry.name)}/${entry.associativity}/${entry.precedence}`
  ),
});

export const applyPatch = (env: MutableEnvironment, patch: Patch): void => {
  switch (patch.kind) {
    case "value":
      env.values.add(patch.name, patch.target);
      return;
    case "union":
      env.unions.add(patch.name, patch.target);
      return;
    case "alias":
      env.aliases.add(patch.name, patch.entry);
      return;
    case "pattern":
      env.patterns.add(patch.name, patch.entry);
      return;
    case "infix":
      env.infixes.add(patch.entry.name.name, patch.entry);
      return;
  }
};

export const environmentFromPatches = (
  home: CanonicalModuleName,
  patches: readonly Patch[]
): MutableEnvironment => {
  const env = createEnvironment(home);
  patches.forEach((patch) => applyPatch(env, patch));
  return env;
};

export const valuePatch = (name: string, target: CanonicalName): Patch => ({
  kind: "value",
  name,
  target,
});

export const unionPatch = (name: string, target: CanonicalName): Patch => ({
  kind: "union",
  name,
  target,
});

export const aliasPatch = (name: string, entry: AliasEntry): Patch => ({
  kind: "alias",
  name,
  entry,
});

export const patternPatch = (
  name: string,
  target: CanonicalName,
  arity: number
): Patch => ({ kind: "pattern", name, entry: { name: target, arity } });

export const infixPatch = (entry: InfixEntry): Patch => ({
  kind: "infix",
  entry,
});
