import type { Graph } from "../graph/model.js";
import type { NodeKey } from "../graph/types.js";
import type { ObservableOptions } from "./observer.js";

/** How depth-first search keeps its frontier. */
export type DfsStrategy = "recursive" | "iterative";

export interface BfsOptions<N extends NodeKey> extends ObservableOptions<N> {
  /** Nodes further than this many edges from the start are never discovered. */
  readonly maxDepth?: number;
  /** Stops once this many nodes have been visited. */
  readonly limit?: number;
}

export interface DfsOptions<N extends NodeKey> extends ObservableOptions<N> {
  /** Defaults to `"recursive"`. Use `"iterative"` on deep graphs. */
  readonly strategy?: DfsStrategy;
}

/**
 * Breadth-first visit order from `start`. Nodes are marked when enqueued, not
 * when dequeued, so no node enters the queue twice and every node is reached
 * along a minimum-edge path. An unknown start yields `[start]`.
 */
export function bfs<N extends NodeKey>(graph: Graph<N>, start: N, options: BfsOptions<N> = {}): N[] {
  const { observer } = options;
  const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  const depth = new Map<N, number>([[start, 0]]);
  const queue: N[] = [start];
  const order: N[] = [];
  observer?.discover?.(start, null);

  for (let head = 0; head < queue.length && order.length < limit; head += 1) {
    const node = queue[head];
    order.push(node);
    observer?.visit?.(node);

    const nodeDepth = depth.get(node) ?? 0;
    if (nodeDepth >= maxDepth) {
      continue;
    }
    for (const neighbor of graph.neighbors(node)) {
      if (!depth.has(neighbor)) {
        depth.set(neighbor, nodeDepth + 1);
        queue.push(neighbor);
        observer?.discover?.(neighbor, node);
      }
    }
  }

  return order;
}

/** Reachable nodes grouped by their edge distance from `start`. */
export function bfsLevels<N extends NodeKey>(graph: Graph<N>, start: N): N[][] {
  const levels: N[][] = [];
  const visited = new Set<N>([start]);
  let frontier: N[] = [start];
  while (frontier.length > 0) {
    levels.push(frontier);
    const next: N[] = [];
    for (const node of frontier) {
      for (const neighbor of graph.neighbors(node)) {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          next.push(neighbor);
        }
      }
    }
    frontier = next;
  }
  return levels;
}

/** Edge distance from `start` to every node it reaches. */
export function bfsDistances<N extends NodeKey>(graph: Graph<N>, start: N): Map<N, number> {
  const distances = new Map<N, number>([[start, 0]]);
  const queue: N[] = [start];
  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    const current = distances.get(node) ?? 0;
    for (const neighbor of graph.neighbors(node)) {
      if (!distances.has(neighbor)) {
        distances.set(neighbor, current + 1);
        queue.push(neighbor);
      }
    }
  }
  return distances;
}

/**
 * Depth-first visit order. Both strategies visit the same set of nodes; the
 * iterative one does not grow the call stack.
 */
export function dfs<N extends NodeKey>(graph: Graph<N>, start: N, options: DfsOptions<N> = {}): N[] {
  return options.strategy === "iterative" ? dfsIterative(graph, start, options) : dfsRecursive(graph, start, options);
}

/** Recursive preorder; a node is marked on entry. Depth is bounded by the longest simple path. */
export function dfsRecursive<N extends NodeKey>(
  graph: Graph<N>,
  start: N,
  options: ObservableOptions<N> = {},
): N[] {
  const { observer } = options;
  const visited = new Set<N>();
  const order: N[] = [];

  const visit = (node: N, parent: N | null): void => {
    visited.add(node);
    order.push(node);
    observer?.discover?.(node, parent);
    observer?.visit?.(node);
    for (const neighbor of graph.neighbors(node)) {
      if (!visited.has(neighbor)) {
        visit(neighbor, node);
      }
    }
    observer?.backtrack?.(node);
  };

  visit(start, null);
  return order;
}

/**
 * Explicit-stack preorder. Neighbours are pushed in reverse so the first
 * inserted one is popped first; a node may sit on the stack several times and
 * is marked only when popped the first time. The observer receives
 * `discover`/`visit` at that moment and no `backtrack` events.
 */
export function dfsIterative<N extends NodeKey>(
  graph: Graph<N>,
  start: N,
  options: ObservableOptions<N> = {},
): N[] {
  const { observer } = options;
  const visited = new Set<N>();
  const order: N[] = [];
  const stack: Array<{ node: N; parent: N | null }> = [{ node: start, parent: null }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame || visited.has(frame.node)) {
      continue;
    }
    visited.add(frame.node);
    order.push(frame.node);
    observer?.discover?.(frame.node, frame.parent);
    observer?.visit?.(frame.node);

    const neighbors = graph.neighbors(frame.node);
    for (let index = neighbors.length - 1; index >= 0; index -= 1) {
      const neighbor = neighbors[index];
      if (!visited.has(neighbor)) {
        stack.push({ node: neighbor, parent: frame.node });
      }
    }
  }

  return order;
}

/** Every node reachable from `start`, including `start`. */
export function reachable<N extends NodeKey>(graph: Graph<N>, start: N): Set<N> {
  return new Set(dfsIterative(graph, start));
}
