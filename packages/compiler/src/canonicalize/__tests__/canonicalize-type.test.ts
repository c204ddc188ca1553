import { describe, expect, it } from "vitest";
import { BUILTIN_PATCHES } from "../builtins.js";
import { canonicalizeType } from "../canonicalize-type.js";
import {
  aliasPatch,
  environmentFromPatches,
  unionPatch,
} from "../environment.js";
import { builtinName, fromModule } from "../names.js";
import type { CanonicalType, RawType } from "../types.js";
import {
  COLORS,
  INT,
  MAIN,
  coreModule,
  rawType,
  rawVar,
  span,
} from "./fixtures.js";

const PALETTE = coreModule("Palette");

const pairBody: CanonicalType = {
  kind: "record",
  fields: [
    { name: "first", type: { kind: "var", name: "a" } },
    { name: "second", type: { kind: "var", name: "b" } },
  ],
};

const env = environmentFromPatches(MAIN, [
  ...BUILTIN_PATCHES,
  unionPatch("Color", fromModule(COLORS, "Color")),
  unionPatch("Color", fromModule(PALETTE, "Color")),
  unionPatch("Maybe", fromModule(COLORS, "Maybe")),
  unionPatch("Maybe", fromModule(MAIN, "Maybe")),
  aliasPatch("Pair", {
    name: fromModule(MAIN, "Pair"),
    typeParams: ["a", "b"],
    body: pairBody,
  }),
]);

const canonicalize = (type: RawType) =>
  canonicalizeType({ env, type, fallbackSpan: span(0) });

describe("canonicalizeType", () => {
  it("resolves union references inside functions and applications", () => {
    const result = canonicalize({
      kind: "lambda",
      from: { kind: "app", head: rawType("Maybe"), args: [rawType("Int")] },
      to: { kind: "app", head: rawType("List"), args: [rawVar("a")] },
    });

    expect(result).toEqual({
      ok: true,
      value: {
        kind: "lambda",
        from: {
          kind: "app",
          head: { kind: "type", name: fromModule(MAIN, "Maybe") },
          args: [INT],
        },
        to: {
          kind: "app",
          head: { kind: "type", name: builtinName("List") },
          args: [{ kind: "var", name: "a" }],
        },
      },
    });
  });

  it("keeps the alias name alongside its body", () => {
    const result = canonicalize({
      kind: "app",
      head: rawType("Pair"),
      args: [rawType("Int"), rawVar("x")],
    });

    expect(result).toEqual({
      ok: true,
      value: {
        kind: "aliased",
        name: fromModule(MAIN, "Pair"),
        args: [
          { param: "a", type: INT },
          { param: "b", type: { kind: "var", name: "x" } },
        ],
        body: pairBody,
      },
    });
  });

  it("suggests similar names for an unknown type", () => {
    expect(canonicalize({ kind: "type", name: "Strng", span: span(7) })).toEqual(
      {
        ok: false,
        error: {
          kind: "type-not-found",
          span: span(7),
          name: "Strng",
          suggestions: ["String"],
        },
      }
    );
  });

  it("prefers the module's own union over an imported one", () => {
    expect(canonicalize(rawType("Maybe"))).toEqual({
      ok: true,
      value: { kind: "type", name: fromModule(MAIN, "Maybe") },
    });
  });

  it("reports every candidate of an ambiguous type", () => {
    expect(canonicalize(rawType("Color"))).toEqual({
      ok: false,
      error: {
        kind: "ambiguous-type",
        span: span(0),
        name: "Color",
        candidates: ["Colors.Color", "Palette.Color"],
      },
    });
  });

  it("checks how many arguments an alias receives", () => {
    const result = canonicalize({
      kind: "app",
      head: { kind: "type", name: "Pair", span: span(3) },
      args: [rawType("Int")],
    });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "alias-arity-mismatch",
        span: span(3),
        name: "Pair",
        expected: 2,
        actual: 1,
      },
    });
  });

  it("stops at the first failing record field", () => {
    const result = canonicalize({
      kind: "record",
      fields: [
        { name: "a", type: rawType("Nope") },
        { name: "b", type: rawType("Color") },
      ],
    });

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "type-not-found", name: "Nope" },
    });
  });
});
