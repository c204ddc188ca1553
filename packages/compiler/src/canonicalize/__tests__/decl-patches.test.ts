import { describe, expect, it } from "vitest";
import type { ModuleDecls } from "../ast.js";
import { boundNames, declsToPatches } from "../decl-patches.js";
import { fromModule, topLevel } from "../names.js";
import { MAIN, rawType, rawVar, span } from "./fixtures.js";

const noDecls: ModuleDecls = { defs: [], unions: [], aliases: [], infixes: [] };

describe("boundNames", () => {
  it("collects every name a destructuring pattern binds", () => {
    expect(
      boundNames({
        kind: "tuple",
        elements: [
          { kind: "var", name: "first" },
          { kind: "record", fields: ["x", "y"] },
          {
            kind: "alias",
            name: "whole",
            pattern: {
              kind: "ctor",
              name: "Just",
              args: [{ kind: "var", name: "inner" }],
            },
          },
          { kind: "anything" },
          { kind: "literal", value: 3 },
        ],
      })
    ).toEqual(["first", "x", "y", "whole", "inner"]);
  });
});

describe("declsToPatches", () => {
  it("gives every destructured name its own top-level value", () => {
    const { patches } = declsToPatches({
      moduleName: MAIN,
      decls: {
        ...noDecls,
        defs: [
          {
            span: span(0),
            pattern: {
              kind: "tuple",
              elements: [
                { kind: "var", name: "a" },
                { kind: "var", name: "b" },
              ],
            },
          },
        ],
      },
    });

    expect(patches).toEqual([
      { kind: "value", name: "a", target: topLevel(MAIN, "a") },
      { kind: "value", name: "b", target: topLevel(MAIN, "b") },
    ]);
  });

  it("declares a union with its constructors as values and patterns", () => {
    const { patches } = declsToPatches({
      moduleName: MAIN,
      decls: {
        ...noDecls,
        unions: [
          {
            span: span(0),
            name: "Tree",
            typeParams: ["a"],
            constructors: [
              { name: "Leaf", args: [] },
              {
                name: "Node",
                args: [
                  { kind: "app", head: rawType("Tree"), args: [rawVar("a")] },
                  rawVar("a"),
                ],
              },
            ],
          },
        ],
      },
    });

    expect(patches).toEqual([
      { kind: "union", name: "Tree", target: fromModule(MAIN, "Tree") },
      { kind: "value", name: "Leaf", target: topLevel(MAIN, "Leaf") },
      { kind: "value", name: "Node", target: topLevel(MAIN, "Node") },
      {
        kind: "pattern",
        name: "Leaf",
        entry: { name: fromModule(MAIN, "Leaf"), arity: 0 },
      },
      {
        kind: "pattern",
        name: "Node",
        entry: { name: fromModule(MAIN, "Node"), arity: 2 },
      },
    ]);
  });

  it("adds a constructor value only for closed record aliases", () => {
    const { patches, aliasNodes } = declsToPatches({
      moduleName: MAIN,
      decls: {
        ...noDecls,
        aliases: [
          {
            span: span(0),
            name: "Point",
            typeParams: [],
            body: {
              kind: "record",
              fields: [
                { name: "x", type: rawType("Int") },
                { name: "y", type: rawType("Int") },
              ],
            },
          },
          {
            span: span(10),
            name: "Named",
            typeParams: ["r"],
            body: {
              kind: "record",
              fields: [{ name: "name", type: rawType("String") }],
              extension: rawVar("r"),
            },
          },
          { span: span(20), name: "Id", typeParams: [], body: rawType("Int") },
        ],
      },
    });

    expect(patches).toEqual([
      { kind: "value", name: "Point", target: topLevel(MAIN, "Point") },
    ]);
    expect(aliasNodes.map((node) => [node.name, node.references])).toEqual([
      ["Point", ["Int", "Int"]],
      ["Named", ["String"]],
      ["Id", ["Int"]],
    ]);
  });

  it("declares local operators as top-level infix entries", () => {
    const { patches } = declsToPatches({
      moduleName: MAIN,
      decls: {
        ...noDecls,
        infixes: [
          { span: span(0), name: "|>", associativity: "left", precedence: 0 },
        ],
      },
    });

    expect(patches).toEqual([
      {
        kind: "infix",
        entry: {
          name: topLevel(MAIN, "|>"),
          associativity: "left",
          precedence: 0,
        },
      },
    ]);
  });
});
