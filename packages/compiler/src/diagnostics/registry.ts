import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  CN0001: { kind: "module-not-found"; requested: string };
  CN0002: {
    kind: "value-not-found";
    moduleName: string;
    name: string;
  };
  CN0003: { kind: "alias-self-recursive"; name: string; body: string };
  CN0004:
    | { kind: "alias-mutually-recursive"; names: readonly string[] }
    | { kind: "alias-in-cycle"; name: string; body: string };
  CN0005: { kind: "type-not-found"; name: string };
  CN0006: {
    kind: "ambiguous-type";
    name: string;
    candidates: readonly string[];
  };
  CN0007: {
    kind: "alias-arity-mismatch";
    name: string;
    expected: number;
    actual: number;
  };
  CN0008: { kind: "interface-decode-failed"; reason: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const pluralArguments = (count: number): string =>
  count === 1 ? "1 argument" : `${count} arguments`;

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  CN0001: {
    code: "CN0001",
    message: (params) => `Unable to find module ${params.requested}`,
    severity: "error",
    phase: "canonicalize",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0001"]>,
  CN0002: {
    code: "CN0002",
    message: (params) =>
      `Module ${params.moduleName} does not expose ${params.name}`,
    severity: "error",
    phase: "canonicalize",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0002"]>,
  CN0003: {
    code: "CN0003",
    message: (params) =>
      `type alias ${params.name} is recursive: ${params.name} = ${params.body}`,
    severity: "error",
    phase: "canonicalize",
    hints: [
      {
        message:
          "Type aliases are expanded in place and cannot refer to themselves. Declare a union type to build a recursive structure.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0003"]>,
  CN0004: {
    code: "CN0004",
    message: (params) => {
      switch (params.kind) {
        case "alias-mutually-recursive":
          return `type aliases ${params.names.join(", ")} are mutually recursive`;
        case "alias-in-cycle":
          return `${params.name} = ${params.body}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "canonicalize",
    hints: [
      {
        message:
          "Break the cycle by turning at least one of these aliases into a union type.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0004"]>,
  CN0005: {
    code: "CN0005",
    message: (params) => `Cannot find type '${params.name}'`,
    severity: "error",
    phase: "canonicalize",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0005"]>,
  CN0006: {
    code: "CN0006",
    message: (params) =>
      `type '${params.name}' is ambiguous; it could refer to ${params.candidates.join(" or ")}`,
    severity: "error",
    phase: "canonicalize",
    hints: [
      { message: "Use a qualified name to pick one of the candidates." },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0006"]>,
  CN0007: {
    code: "CN0007",
    message: (params) =>
      `type alias ${params.name} expects ${pluralArguments(params.expected)}, but it was given ${params.actual}`,
    severity: "error",
    phase: "canonicalize",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0007"]>,
  CN0008: {
    code: "CN0008",
    message: (params) => `corrupt module interface: ${params.reason}`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CN0008"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
