import { describe, expect, it } from "vitest";
import { restrictToPublicApi } from "../restrict.js";
import {
  arithInterface,
  colorsInterface,
  makeInterface,
  coreModule,
  INT,
} from "./fixtures.js";

describe("restrictToPublicApi", () => {
  it("drops values missing from the export list", () => {
    const restricted = restrictToPublicApi(arithInterface);

    expect(Array.from(restricted.types.keys())).toEqual(["add", "sub"]);
    expect(restricted.fixities).toEqual(arithInterface.fixities);
  });

  it("keeps only the constructors a union exports", () => {
    const restricted = restrictToPublicApi(colorsInterface);

    expect(
      restricted.unions.get("Color")?.constructors.map((ctor) => ctor.name)
    ).toEqual(["Red", "Green"]);
    expect(restricted.types.has("Red")).toBe(true);
    expect(restricted.types.has("Green")).toBe(true);
    expect(restricted.types.has("Blue")).toBe(false);
  });

  it("drops unions and aliases that are not exported", () => {
    const restricted = restrictToPublicApi(colorsInterface);

    expect(Array.from(restricted.unions.keys())).toEqual(["Color"]);
    expect(Array.from(restricted.aliases.keys())).toEqual(["Point", "Name"]);
  });

  it("keeps every constructor of a union exported open", () => {
    const iface = makeInterface({
      module: coreModule("Maybe"),
      exports: [
        {
          kind: "union",
          name: "Maybe",
          constructors: { values: [], open: true },
        },
      ],
      types: { Just: INT, Nothing: INT },
      unions: {
        Maybe: {
          typeParams: ["a"],
          constructors: [
            { name: "Just", args: [{ kind: "var", name: "a" }] },
            { name: "Nothing", args: [] },
          ],
        },
      },
    });

    const restricted = restrictToPublicApi(iface);

    expect(Array.from(restricted.types.keys())).toEqual(["Just", "Nothing"]);
    expect(restricted.unions.get("Maybe")).toEqual(iface.unions.get("Maybe"));
  });

  it("is idempotent", () => {
    [arithInterface, colorsInterface].forEach((iface) => {
      const once = restrictToPublicApi(iface);
      expect(restrictToPublicApi(once)).toEqual(once);
    });
  });
});
