import { decode, encode } from "@msgpack/msgpack";
import {
  diagnosticFromCode,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type {
  AliasInfo,
  Associativity,
  ExposedValue,
  InfixDecl,
  Listing,
  ModuleInterface,
  UnionConstructor,
  UnionInfo,
} from "../canonicalize/interface.js";
import type {
  CanonicalModuleName,
  CanonicalName,
  SymbolHome,
} from "../canonicalize/names.js";
import { fail, ok, traverse, type Result } from "../canonicalize/result.js";
import type {
  AliasArgument,
  CanonicalRecordField,
  CanonicalType,
} from "../canonicalize/types.js";

export const INTERFACE_FORMAT_VERSION = 1;

export type InterfaceDecodeError = {
  kind: "interface-decode-failed";
  reason: string;
};

type Decoded<T> = Result<T, string>;
type Decoder<T> = (value: unknown, path: string) => Decoded<T>;

/** Serializes an interface for an interface file. */
export const encodeInterface = (iface: ModuleInterface): Uint8Array =>
  encode({
    version: INTERFACE_FORMAT_VERSION,
    module: iface.module,
    exports: iface.exports,
    types: Array.from(iface.types.entries()),
    unions: Array.from(iface.unions.entries()),
    aliases: Array.from(iface.aliases.entries()),
    fixities: iface.fixities,
  });

export const decodeInterface = (
  bytes: Uint8Array
): Result<ModuleInterface, InterfaceDecodeError> => {
  let payload: unknown;
  try {
    payload = decode(bytes);
  } catch (error) {
    return fail<InterfaceDecodeError>({
      kind: "interface-decode-failed",
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const decoded = decodeModuleInterface(payload, "$");
  return decoded.ok
    ? decoded
    : fail<InterfaceDecodeError>({
        kind: "interface-decode-failed",
        reason: decoded.error,
      });
};

export const interfaceDecodeErrorToDiagnostic = (
  error: InterfaceDecodeError,
  span: SourceSpan
): Diagnostic =>
  diagnosticFromCode({
    code: "CN0008",
    params: { kind: "interface-decode-failed", reason: error.reason },
    span,
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const expected = (what: string, path: string): { ok: false; error: string } =>
  fail(`expected ${what} at ${path}`);

const decodeString: Decoder<string> = (value, path) =>
  typeof value === "string" ? ok(value) : expected("a string", path);

const decodeNumber: Decoder<number> = (value, path) =>
  typeof value === "number" ? ok(value) : expected("a number", path);

const decodeBoolean: Decoder<boolean> = (value, path) =>
  typeof value === "boolean" ? ok(value) : expected("a boolean", path);

const decodeArray =
  <T>(item: Decoder<T>): Decoder<T[]> =>
  (value, path) =>
    Array.isArray(value)
      ? traverse(value, (entry: unknown, index) => item(entry, `${path}[${index}]`))
      : expected("an array", path);

const decodeEntries =
  <T>(item: Decoder<T>): Decoder<Map<string, T>> =>
  (value, path) => {
    if (!Array.isArray(value)) {
      return expected("an entry list", path);
    }
    const entries = traverse(
      value,
      (entry: unknown, index): Decoded<[string, T]> => {
        const entryPath = `${path}[${index}]`;
        if (!Array.isArray(entry) || entry.length !== 2) {
          return expected("a [key, value] pair", entryPath);
        }
        const key = decodeString(entry[0], `${entryPath}[0]`);
        if (!key.ok) return key;
        const decoded = item(entry[1], `${entryPath}[1]`);
        return decoded.ok ? ok<[string, T]>([key.value, decoded.value]) : decoded;
      }
    );
    return entries.ok ? ok(new Map(entries.value)) : entries;
  };

const field = <T>(
  record: Record<string, unknown>,
  key: string,
  path: string,
  decoder: Decoder<T>
): Decoded<T> => decoder(record[key], `${path}.${key}`);

const decodeModuleName: Decoder<CanonicalModuleName> = (value, path) => {
  if (!isRecord(value)) return expected("a module name", path);
  const pkg = field(value, "package", path, decodeString);
  if (!pkg.ok) return pkg;
  const module = field(value, "module", path, decodeString);
  if (!module.ok) return module;
  return ok({ package: pkg.value, module: module.value });
};

const decodeHome: Decoder<SymbolHome> = (value, path) => {
  if (!isRecord(value)) return expected("a symbol home", path);
  const kind = value.kind;
  if (kind === "builtin") {
    return ok<SymbolHome>({ kind });
  }
  if (kind === "module" || kind === "top-level") {
    const module = field(value, "module", path, decodeModuleName);
    return module.ok ? ok<SymbolHome>({ kind, module: module.value }) : module;
  }
  return expected("a symbol home kind", `${path}.kind`);
};

const decodeCanonicalName: Decoder<CanonicalName> = (value, path) => {
  if (!isRecord(value)) return expected("a canonical name", path);
  const home = field(value, "home", path, decodeHome);
  if (!home.ok) return home;
  const name = field(value, "name", path, decodeString);
  if (!name.ok) return name;
  return ok({ home: home.value, name: name.value });
};

const decodeType: Decoder<CanonicalType> = (value, path) => {
  if (!isRecord(value)) return expected("a type", path);

  switch (value.kind) {
    case "var": {
      const name = field(value, "name", path, decodeString);
      return name.ok ? ok<CanonicalType>({ kind: "var", name: name.value }) : name;
    }
    case "type": {
      const name = field(value, "name", path, decodeCanonicalName);
      return name.ok ? ok<CanonicalType>({ kind: "type", name: name.value }) : name;
    }
    case "lambda": {
      const from = field(value, "from", path, decodeType);
      if (!from.ok) return from;
      const to = field(value, "to", path, decodeType);
      if (!to.ok) return to;
      return ok<CanonicalType>({ kind: "lambda", from: from.value, to: to.value });
    }
    case "app": {
      const head = field(value, "head", path, decodeType);
      if (!head.ok) return head;
      const args = field(value, "args", path, decodeArray(decodeType));
      if (!args.ok) return args;
      return ok<CanonicalType>({ kind: "app", head: head.value, args: args.value });
    }
    case "record": {
      const fields = field(value, "fields", path, decodeArray(decodeRecordField));
      if (!fields.ok) return fields;
      if (value.extension === undefined || value.extension === null) {
        return ok<CanonicalType>({ kind: "record", fields: fields.value });
      }
      const extension = field(value, "extension", path, decodeType);
      if (!extension.ok) return extension;
      return ok<CanonicalType>({
        kind: "record",
        fields: fields.value,
        extension: extension.value,
      });
    }
    case "aliased": {
      const name = field(value, "name", path, decodeCanonicalName);
      if (!name.ok) return name;
      const args = field(value, "args", path, decodeArray(decodeAliasArgument));
      if (!args.ok) return args;
      const body = field(value, "body", path, decodeType);
      if (!body.ok) return body;
      return ok<CanonicalType>({
        kind: "aliased",
        name: name.value,
        args: args.value,
        body: body.value,
      });
    }
  }
  return expected("a type kind", `${path}.kind`);
};

const decodeRecordField: Decoder<CanonicalRecordField> = (value, path) => {
  if (!isRecord(value)) return expected("a record field", path);
  const name = field(value, "name", path, decodeString);
  if (!name.ok) return name;
  const type = field(value, "type", path, decodeType);
  if (!type.ok) return type;
  return ok({ name: name.value, type: type.value });
};

const decodeAliasArgument: Decoder<AliasArgument> = (value, path) => {
  if (!isRecord(value)) return expected("an alias argument", path);
  const param = field(value, "param", path, decodeString);
  if (!param.ok) return param;
  const type = field(value, "type", path, decodeType);
  if (!type.ok) return type;
  return ok({ param: param.value, type: type.value });
};

const decodeListing: Decoder<Listing<string>> = (value, path) => {
  if (!isRecord(value)) return expected("a listing", path);
  const values = field(value, "values", path, decodeArray(decodeString));
  if (!values.ok) return values;
  const open = field(value, "open", path, decodeBoolean);
  if (!open.ok) return open;
  return ok({ values: values.value, open: open.value });
};

const decodeExposedValue: Decoder<ExposedValue> = (value, path) => {
  if (!isRecord(value)) return expected("an export", path);
  const name = field(value, "name", path, decodeString);
  if (!name.ok) return name;

  const kind = value.kind;
  if (kind === "value" || kind === "alias") {
    return ok<ExposedValue>({ kind, name: name.value });
  }
  if (kind === "union") {
    const constructors = field(value, "constructors", path, decodeListing);
    if (!constructors.ok) return constructors;
    return ok<ExposedValue>({
      kind: "union",
      name: name.value,
      constructors: constructors.value,
    });
  }
  return expected("an export kind", `${path}.kind`);
};

const decodeTypeParams = decodeArray(decodeString);

const decodeConstructor: Decoder<UnionConstructor> = (value, path) => {
  if (!isRecord(value)) return expected("a constructor", path);
  const name = field(value, "name", path, decodeString);
  if (!name.ok) return name;
  const args = field(value, "args", path, decodeArray(decodeType));
  if (!args.ok) return args;
  return ok({ name: name.value, args: args.value });
};

const decodeUnion: Decoder<UnionInfo> = (value, path) => {
  if (!isRecord(value)) return expected("a union", path);
  const typeParams = field(value, "typeParams", path, decodeTypeParams);
  if (!typeParams.ok) return typeParams;
  const constructors = field(
    value,
    "constructors",
    path,
    decodeArray(decodeConstructor)
  );
  if (!constructors.ok) return constructors;
  return ok({ typeParams: typeParams.value, constructors: constructors.value });
};

const decodeAlias: Decoder<AliasInfo> = (value, path) => {
  if (!isRecord(value)) return expected("an alias", path);
  const typeParams = field(value, "typeParams", path, decodeTypeParams);
  if (!typeParams.ok) return typeParams;
  const body = field(value, "body", path, decodeType);
  if (!body.ok) return body;
  return ok({ typeParams: typeParams.value, body: body.value });
};

const decodeAssociativity: Decoder<Associativity> = (value, path) =>
  value === "left" || value === "right" || value === "non"
    ? ok(value)
    : expected("an associativity", path);

const decodeFixity: Decoder<InfixDecl> = (value, path) => {
  if (!isRecord(value)) return expected("a fixity", path);
  const name = field(value, "name", path, decodeString);
  if (!name.ok) return name;
  const associativity = field(value, "associativity", path, decodeAssociativity);
  if (!associativity.ok) return associativity;
  const precedence = field(value, "precedence", path, decodeNumber);
  if (!precedence.ok) return precedence;
  return ok({
    name: name.value,
    associativity: associativity.value,
    precedence: precedence.value,
  });
};

const decodeModuleInterface: Decoder<ModuleInterface> = (value, path) => {
  if (!isRecord(value)) return expected("an interface", path);
  if (value.version !== INTERFACE_FORMAT_VERSION) {
    return fail(
      `unsupported interface format version ${String(value.version)} (expected ${INTERFACE_FORMAT_VERSION})`
    );
  }

  const module = field(value, "module", path, decodeModuleName);
  if (!module.ok) return module;
  const exports = field(value, "exports", path, decodeArray(decodeExposedValue));
  if (!exports.ok) return exports;
  const types = field(value, "types", path, decodeEntries(decodeType));
  if (!types.ok) return types;
  const unions = field(value, "unions", path, decodeEntries(decodeUnion));
  if (!unions.ok) return unions;
  const aliases = field(value, "aliases", path, decodeEntries(decodeAlias));
  if (!aliases.ok) return aliases;
  const fixities = field(value, "fixities", path, decodeArray(decodeFixity));
  if (!fixities.ok) return fixities;

  return ok({
    module: module.value,
    exports: exports.value,
    types: types.value,
    unions: unions.value,
    aliases: aliases.value,
    fixities: fixities.value,
  });
};
