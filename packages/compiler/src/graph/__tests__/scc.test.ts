import { describe, expect, it } from "vitest";
import { stronglyConnectedComponents } from "../scc.js";

describe("stronglyConnectedComponents", () => {
  it("returns dependencies before dependents for acyclic graphs", () => {
    const groups = stronglyConnectedComponents({
      nodeCount: 3,
      edges: [[1], [2], []],
    });

    expect(groups).toEqual([
      { nodes: [2], cyclic: false },
      { nodes: [1], cyclic: false },
      { nodes: [0], cyclic: false },
    ]);
  });

  it("groups cyclic nodes into a single component", () => {
    const groups = stronglyConnectedComponents({
      nodeCount: 3,
      edges: [[1], [2], [1]],
    });

    expect(groups).toEqual([
      { nodes: [1, 2], cyclic: true },
      { nodes: [0], cyclic: false },
    ]);
  });

  it("marks self-looped nodes as cyclic", () => {
    expect(
      stronglyConnectedComponents({ nodeCount: 1, edges: [[0]] })
    ).toEqual([{ nodes: [0], cyclic: true }]);
  });

  it("ignores edges pointing outside the graph", () => {
    expect(
      stronglyConnectedComponents({ nodeCount: 2, edges: [[5, -1], []] })
    ).toEqual([
      { nodes: [0], cyclic: false },
      { nodes: [1], cyclic: false },
    ]);
  });
});
