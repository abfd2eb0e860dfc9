import type { Graph } from "../graph/model.js";
import type { NodeKey } from "../graph/types.js";

export type StronglyConnectedComponent<N extends NodeKey> = N[];

/**
 * Strongly connected components in one depth-first pass (Tarjan).
 *
 * Every node gets a discovery rank and a low rank: the smallest rank it can
 * reach through its subtree plus one edge back into a still-open node. A node
 * whose low rank equals its own rank roots a component made of itself and
 * every node opened after it. Components of the condensation's sinks come out
 * first; members are listed most recently opened first, root last.
 */
export function stronglyConnectedComponents<N extends NodeKey>(graph: Graph<N>): StronglyConnectedComponent<N>[] {
  const rank = new Map<N, number>();
  const low = new Map<N, number>();
  const open: N[] = [];
  const isOpen = new Set<N>();
  const components: StronglyConnectedComponent<N>[] = [];

  const lower = (node: N, candidate: number): void => {
    low.set(node, Math.min(low.get(node) ?? candidate, candidate));
  };

  const close = (root: N): StronglyConnectedComponent<N> => {
    const members = open.splice(open.lastIndexOf(root)).reverse();
    for (const member of members) {
      isOpen.delete(member);
    }
    return members;
  };

  const visit = (node: N): void => {
    const own = rank.size;
    rank.set(node, own);
    low.set(node, own);
    open.push(node);
    isOpen.add(node);

    for (const next of graph.neighbors(node)) {
      const seen = rank.get(next);
      if (seen === undefined) {
        visit(next);
        lower(node, low.get(next) ?? own);
      } else if (isOpen.has(next)) {
        lower(node, seen);
      }
    }

    if (low.get(node) === own) {
      components.push(close(node));
    }
  };

  for (const node of graph.nodes()) {
    if (!rank.has(node)) {
      visit(node);
    }
  }
  return components;
}
