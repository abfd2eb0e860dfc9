import type { Graph } from "../graph/model.js";
import type { NodeKey } from "../graph/types.js";

/**
 * Outcome of a topological sort. A failed sort never carries a partial order:
 * `remaining` lists the nodes that could not be placed because they sit on,
 * or downstream of, a cycle.
 */
export type TopologicalResult<N extends NodeKey> =
  | { readonly ok: true; readonly order: N[] }
  | { readonly ok: false; readonly remaining: N[] };

/**
 * Kahn's algorithm. The queue is seeded with every zero in-degree node in
 * graph order and processed first-in first-out, so the order is stable for a
 * given insertion history. Meaningful on directed graphs: an undirected edge
 * counts as two opposite arcs and therefore as a cycle.
 */
export function topologicalSort<N extends NodeKey>(graph: Graph<N>): TopologicalResult<N> {
  const { order, remaining } = peel(graph);
  return remaining.length === 0 ? { ok: true, order } : { ok: false, remaining };
}

/**
 * Depth-first variant: reverse post-order. On a cycle it reports the same
 * `remaining` set as {@link topologicalSort}.
 */
export function topologicalSortDfs<N extends NodeKey>(graph: Graph<N>): TopologicalResult<N> {
  const state = new Map<N, "active" | "done">();
  const postOrder: N[] = [];

  const visit = (node: N): boolean => {
    state.set(node, "active");
    for (const neighbor of graph.neighbors(node)) {
      const seen = state.get(neighbor);
      if (seen === "active") {
        return false;
      }
      if (seen === undefined && !visit(neighbor)) {
        return false;
      }
    }
    state.set(node, "done");
    postOrder.push(node);
    return true;
  };

  for (const node of graph.nodes()) {
    if (!state.has(node) && !visit(node)) {
      return { ok: false, remaining: peel(graph).remaining };
    }
  }
  return { ok: true, order: postOrder.reverse() };
}

/** `true` when `order` lists every node exactly once and every edge points forward. */
export function isTopologicalOrder<N extends NodeKey>(graph: Graph<N>, order: readonly N[]): boolean {
  const position = new Map<N, number>();
  order.forEach((node, index) => position.set(node, index));
  if (position.size !== order.length || position.size !== graph.nodeCount) {
    return false;
  }
  return graph.edges().every((edge) => {
    const from = position.get(edge.from);
    const to = position.get(edge.to);
    return from !== undefined && to !== undefined && from < to;
  });
}

function peel<N extends NodeKey>(graph: Graph<N>): { order: N[]; remaining: N[] } {
  const inDegree = new Map<N, number>();
  for (const node of graph.nodes()) {
    inDegree.set(node, 0);
  }
  for (const node of graph.nodes()) {
    for (const neighbor of graph.neighbors(node)) {
      inDegree.set(neighbor, (inDegree.get(neighbor) ?? 0) + 1);
    }
  }

  const queue = graph.nodes().filter((node) => inDegree.get(node) === 0);
  for (let head = 0; head < queue.length; head += 1) {
    for (const neighbor of graph.neighbors(queue[head])) {
      const degree = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, degree);
      if (degree === 0) {
        queue.push(neighbor);
      }
    }
  }

  const placed = new Set(queue);
  return { order: queue, remaining: graph.nodes().filter((node) => !placed.has(node)) };
}
