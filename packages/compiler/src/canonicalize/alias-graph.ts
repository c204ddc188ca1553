import type { SourceSpan } from "../diagnostics/index.js";
import { stronglyConnectedComponents } from "../graph/scc.js";
import type { AliasDecl } from "./ast.js";
import { canonicalizeType } from "./canonicalize-type.js";
import type { MutableEnvironment } from "./environment.js";
import type { CanonicalizeError, RecursiveAlias } from "./errors.js";
import { fromModule, type CanonicalModuleName } from "./names.js";
import { fail, ok, type Result } from "./result.js";
import type { SuggestionOptions } from "./suggestions.js";
import type { RawType } from "./types.js";

/**
 * A local type alias as a dependency-graph node. `references` lists every
 * type name its body mentions; only names of other local aliases become
 * edges.
 */
export interface AliasNode {
  span: SourceSpan;
  name: string;
  typeParams: readonly string[];
  body: RawType;
  references: readonly string[];
}

export const typeReferences = (type: RawType): string[] => {
  switch (type.kind) {
    case "var":
      return [];
    case "type":
      return [type.name];
    case "lambda":
      return [...typeReferences(type.from), ...typeReferences(type.to)];
    case "app":
      return [type.head, ...type.args].flatMap(typeReferences);
    case "record":
      return [
        ...(type.extension ? typeReferences(type.extension) : []),
        ...type.fields.flatMap((field) => typeReferences(field.type)),
      ];
  }
};

export const aliasToNode = (alias: AliasDecl): AliasNode => ({
  span: alias.span,
  name: alias.name,
  typeParams: alias.typeParams,
  body: alias.body,
  references: typeReferences(alias.body),
});

const recursiveAlias = (node: AliasNode): RecursiveAlias => ({
  span: node.span,
  name: node.name,
  typeParams: node.typeParams,
  body: node.body,
});

/**
 * Installs the module's own aliases into `env`, dependencies before
 * dependents, so each body is canonicalized against the aliases it uses.
 * Alias cycles would need infinite expansion and are rejected.
 */
export const addTypeAliases = ({
  moduleName,
  nodes,
  env,
  suggestions,
}: {
  moduleName: CanonicalModuleName;
  nodes: readonly AliasNode[];
  env: MutableEnvironment;
  suggestions?: SuggestionOptions;
}): Result<MutableEnvironment, CanonicalizeError> => {
  const indexByName = new Map<string, number>();
  nodes.forEach((node, index) => {
    if (!indexByName.has(node.name)) {
      indexByName.set(node.name, index);
    }
  });

  const edges = nodes.map((node) =>
    Array.from(
      new Set(
        node.references.flatMap((reference) => {
          const target = indexByName.get(reference);
          return target === undefined ? [] : [target];
        })
      )
    )
  );

  const components = stronglyConnectedComponents({
    nodeCount: nodes.length,
    edges,
  });

  for (const component of components) {
    const members = component.nodes.flatMap((index) => {
      const node = nodes[index];
      return node ? [node] : [];
    });
    const [first] = members;
    if (!first) {
      continue;
    }

    if (members.length > 1) {
      return fail<CanonicalizeError>({
        kind: "alias-mutually-recursive",
        span: first.span,
        aliases: members.map(recursiveAlias),
      });
    }

    if (component.cyclic) {
      return fail<CanonicalizeError>({
        kind: "alias-self-recursive",
        ...recursiveAlias(first),
      });
    }

    const body = canonicalizeType({
      env,
      type: first.body,
      fallbackSpan: first.span,
      suggestions,
    });
    if (!body.ok) {
      return body;
    }

    env.aliases.add(first.name, {
      name: fromModule(moduleName, first.name),
      typeParams: first.typeParams,
      body: body.value,
    });
  }

  return ok(env);
};
