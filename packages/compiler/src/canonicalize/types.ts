import type { SourceSpan } from "../diagnostics/index.js";
import type { CanonicalName } from "./names.js";

export type RawType =
  | { kind: "lambda"; from: RawType; to: RawType; span?: SourceSpan }
  | { kind: "var"; name: string; span?: SourceSpan }
  /** `name` is the name as written, possibly qualified (`Dict.Dict`). */
  | { kind: "type"; name: string; span?: SourceSpan }
  | { kind: "app"; head: RawType; args: readonly RawType[]; span?: SourceSpan }
  | {
      kind: "record";
      fields: readonly RawRecordField[];
      extension?: RawType;
      span?: SourceSpan;
    };

export interface RawRecordField {
  name: string;
  type: RawType;
}

export type CanonicalType =
  | { kind: "lambda"; from: CanonicalType; to: CanonicalType }
  | { kind: "var"; name: string }
  | { kind: "type"; name: CanonicalName }
  | { kind: "app"; head: CanonicalType; args: readonly CanonicalType[] }
  | {
      kind: "record";
      fields: readonly CanonicalRecordField[];
      extension?: CanonicalType;
    }
  /**
   * A use of a type alias. `body` is the alias's own definition with its
   * type parameters left in place; `args` binds each parameter.
   */
  | {
      kind: "aliased";
      name: CanonicalName;
      args: readonly AliasArgument[];
      body: CanonicalType;
    };

export interface CanonicalRecordField {
  name: string;
  type: CanonicalType;
}

export interface AliasArgument {
  param: string;
  type: CanonicalType;
}

export const formatRawType = (type: RawType): string => {
  switch (type.kind) {
    case "var":
    case "type":
      return type.name;
    case "lambda": {
      const from =
        type.from.kind === "lambda"
          ? `(${formatRawType(type.from)})`
          : formatRawType(type.from);
      return `${from} -> ${formatRawType(type.to)}`;
    }
    case "app":
      return [type.head, ...type.args]
        .map((part) =>
          part.kind === "app" || part.kind === "lambda"
            ? `(${formatRawType(part)})`
            : formatRawType(part)
        )
        .join(" ");
    case "record": {
      if (type.fields.length === 0 && !type.extension) {
        return "{}";
      }
      const fields = type.fields
        .map((field) => `${field.name} : ${formatRawType(field.type)}`)
        .join(", ");
      return type.extension
        ? `{ ${formatRawType(type.extension)} | ${fields} }`
        : `{ ${fields} }`;
    }
  }
};
