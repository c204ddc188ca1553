import {
  diagnosticFromCode,
  type Diagnostic,
  type DiagnosticHint,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { RawType } from "./types.js";
import { formatRawType } from "./types.js";

/** One alias taking part in a recursion error, as it was written. */
export interface RecursiveAlias {
  span: SourceSpan;
  name: string;
  typeParams: readonly string[];
  body: RawType;
}

export type CanonicalizeError =
  | {
      kind: "module-not-found";
      span: SourceSpan;
      requested: string;
      suggestions: readonly string[];
    }
  | {
      kind: "value-not-found";
      span: SourceSpan;
      moduleName: string;
      name: string;
      suggestions: readonly string[];
    }
  | ({ kind: "alias-self-recursive" } & RecursiveAlias)
  | {
      kind: "alias-mutually-recursive";
      span: SourceSpan;
      /** Sorted by declaration order. */
      aliases: readonly RecursiveAlias[];
    }
  | {
      kind: "type-not-found";
      span: SourceSpan;
      name: string;
      suggestions: readonly string[];
    }
  | {
      kind: "ambiguous-type";
      span: SourceSpan;
      name: string;
      candidates: readonly string[];
    }
  | {
      kind: "alias-arity-mismatch";
      span: SourceSpan;
      name: string;
      expected: number;
      actual: number;
    };

const suggestionHints = (
  suggestions: readonly string[]
): readonly DiagnosticHint[] | undefined =>
  suggestions.length === 0
    ? undefined
    : [{ message: `Did you mean ${suggestions.map((s) => `'${s}'`).join(", ")}?` }];

const aliasHeader = (alias: RecursiveAlias): string =>
  [alias.name, ...alias.typeParams].join(" ");

export const canonicalizeErrorToDiagnostic = (
  error: CanonicalizeError
): Diagnostic => {
  switch (error.kind) {
    case "module-not-found":
      return diagnosticFromCode({
        code: "CN0001",
        params: { kind: "module-not-found", requested: error.requested },
        span: error.span,
        hints: suggestionHints(error.suggestions),
      });
    case "value-not-found":
      return diagnosticFromCode({
        code: "CN0002",
        params: {
          kind: "value-not-found",
          moduleName: error.moduleName,
          name: error.name,
        },
        span: error.span,
        hints: suggestionHints(error.suggestions),
      });
    case "alias-self-recursive":
      return diagnosticFromCode({
        code: "CN0003",
        params: {
          kind: "alias-self-recursive",
          name: aliasHeader(error),
          body: formatRawType(error.body),
        },
        span: error.span,
      });
    case "alias-mutually-recursive":
      return diagnosticFromCode({
        code: "CN0004",
        params: {
          kind: "alias-mutually-recursive",
          names: error.aliases.map((alias) => alias.name),
        },
        span: error.span,
        related: error.aliases.slice(1).map((alias) =>
          diagnosticFromCode({
            code: "CN0004",
            params: {
              kind: "alias-in-cycle",
              name: aliasHeader(alias),
              body: formatRawType(alias.body),
            },
            span: alias.span,
            severity: "note",
            hints: [],
          })
        ),
      });
    case "type-not-found":
      return diagnosticFromCode({
        code: "CN0005",
        params: { kind: "type-not-found", name: error.name },
        span: error.span,
        hints: suggestionHints(error.suggestions),
      });
    case "ambiguous-type":
      return diagnosticFromCode({
        code: "CN0006",
        params: {
          kind: "ambiguous-type",
          name: error.name,
          candidates: error.candidates,
        },
        span: error.span,
      });
    case "alias-arity-mismatch":
      return diagnosticFromCode({
        code: "CN0007",
        params: {
          kind: "alias-arity-mismatch",
          name: error.name,
          expected: error.expected,
          actual: error.actual,
        },
        span: error.span,
      });
  }
};
