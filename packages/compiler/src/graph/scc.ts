export type SccGroup = {
  /** Node indices, ascending. */
  nodes: readonly number[];
  cyclic: boolean;
};

/**
 * Tarjan's strongly connected components over a dense graph where node `i`
 * depends on every index in `edges[i]`. Groups come out dependencies first.
 */
export const stronglyConnectedComponents = ({
  nodeCount,
  edges,
}: {
  nodeCount: number;
  edges: ReadonlyArray<readonly number[]>;
}): SccGroup[] => {
  let index = 0;
  const stack: number[] = [];
  const onStack = new Array<boolean>(nodeCount).fill(false);
  const indexByNode = new Array<number | undefined>(nodeCount).fill(undefined);
  const lowlinkByNode = new Array<number>(nodeCount).fill(0);
  const groups: number[][] = [];

  const successorsOf = (node: number): readonly number[] =>
    (edges[node] ?? []).filter((target) => target >= 0 && target < nodeCount);

  const visit = (node: number) => {
    indexByNode[node] = index;
    lowlinkByNode[node] = index;
    index += 1;
    stack.push(node);
    onStack[node] = true;

    successorsOf(node).forEach((successor) => {
      const successorIndex = indexByNode[successor];
      if (successorIndex === undefined) {
        visit(successor);
        lowlinkByNode[node] = Math.min(
          lowlinkByNode[node] ?? 0,
          lowlinkByNode[successor] ?? 0
        );
        return;
      }

      if (!onStack[successor]) {
        return;
      }

      lowlinkByNode[node] = Math.min(lowlinkByNode[node] ?? 0, successorIndex);
    });

    if (lowlinkByNode[node] !== indexByNode[node]) {
      return;
    }

    const component: number[] = [];
    while (stack.length > 0) {
      const member = stack.pop();
      if (member === undefined) {
        break;
      }
      onStack[member] = false;
      component.push(member);
      if (member === node) {
        break;
      }
    }

    component.sort((left, right) => left - right);
    groups.push(component);
  };

  for (let node = 0; node < nodeCount; node += 1) {
    if (indexByNode[node] === undefined) {
      visit(node);
    }
  }

  return groups.map((group) => ({
    nodes: group,
    cyclic: isCyclicGroup({ group, successorsOf }),
  }));
};

const isCyclicGroup = ({
  group,
  successorsOf,
}: {
  group: readonly number[];
  successorsOf: (node: number) => readonly number[];
}): boolean => {
  if (group.length > 1) {
    return true;
  }
  const [node] = group;
  if (node === undefined) {
    return false;
  }
  return successorsOf(node).includes(node);
};
