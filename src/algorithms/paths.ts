import type { Graph } from "../graph/model.js";
import type { NodeKey } from "../graph/types.js";
import type { ObservableOptions } from "./observer.js";

export interface ShortestPathOptions<N extends NodeKey> extends ObservableOptions<N> {
  /** Nodes the path may not enter. An avoided start or target means no path. */
  readonly avoid?: Iterable<N>;
}

export interface AllPathsOptions {
  /** Upper bound on the number of edges of a reported path. */
  readonly maxEdges?: number;
}

/**
 * Minimum-edge path from `start` to `target`, or `null` when the target is
 * unreachable. `start === target` yields `[start]`.
 *
 * The search returns as soon as the target is discovered: nodes are marked at
 * discovery, so the first path to reach it is a shortest one.
 */
export function shortestPath<N extends NodeKey>(
  graph: Graph<N>,
  start: N,
  target: N,
  options: ShortestPathOptions<N> = {},
): N[] | null {
  const { observer } = options;
  const avoid = new Set<N>(options.avoid ?? []);
  if (avoid.has(start) || avoid.has(target)) {
    return null;
  }
  if (start === target) {
    return [start];
  }

  const parents = new Map<N, N | null>([[start, null]]);
  const queue: N[] = [start];
  observer?.discover?.(start, null);

  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    observer?.visit?.(node);
    for (const neighbor of graph.neighbors(node)) {
      if (parents.has(neighbor) || avoid.has(neighbor)) {
        continue;
      }
      parents.set(neighbor, node);
      observer?.discover?.(neighbor, node);
      if (neighbor === target) {
        return tracePath(parents, target);
      }
      queue.push(neighbor);
    }
  }
  return null;
}

/** Some path from `start` to `target` found by recursive depth-first search, or `null`. */
export function findPath<N extends NodeKey>(graph: Graph<N>, start: N, target: N): N[] | null {
  const visited = new Set<N>();
  const path: N[] = [];

  const search = (node: N): boolean => {
    visited.add(node);
    path.push(node);
    if (node === target) {
      return true;
    }
    for (const neighbor of graph.neighbors(node)) {
      if (!visited.has(neighbor) && search(neighbor)) {
        return true;
      }
    }
    path.pop();
    return false;
  };

  return search(start) ? path : null;
}

/**
 * Every simple path from `start` to `target`, in depth-first order. A node
 * already on the current path is never re-entered, which keeps cycles
 * elsewhere in the graph harmless.
 *
 * The number of simple paths grows exponentially with the graph; bound the
 * search with `maxEdges` on anything but small inputs.
 */
export function findAllPaths<N extends NodeKey>(
  graph: Graph<N>,
  start: N,
  target: N,
  options: AllPathsOptions = {},
): N[][] {
  const maxEdges = options.maxEdges ?? Number.POSITIVE_INFINITY;
  const paths: N[][] = [];
  const path: N[] = [start];
  const onPath = new Set<N>([start]);

  const extend = (node: N): void => {
    if (node === target) {
      paths.push([...path]);
      return;
    }
    if (path.length - 1 >= maxEdges) {
      return;
    }
    for (const neighbor of graph.neighbors(node)) {
      if (onPath.has(neighbor)) {
        continue;
      }
      path.push(neighbor);
      onPath.add(neighbor);
      extend(neighbor);
      path.pop();
      onPath.delete(neighbor);
    }
  };

  extend(start);
  return paths;
}

/** Sum of the edge weights along `path`; `undefined` when a hop has no edge. */
export function pathWeight<N extends NodeKey>(graph: Graph<N>, path: readonly N[]): number | undefined {
  if (path.length === 0) {
    return undefined;
  }
  let total = 0;
  for (let index = 1; index < path.length; index += 1) {
    const edge = graph.getEdge(path[index - 1], path[index]);
    if (!edge) {
      return undefined;
    }
    total += edge.weight;
  }
  return total;
}

/** Follows parent pointers back from `target` and returns the path start-first. */
export function tracePath<N extends NodeKey>(parents: ReadonlyMap<N, N | null>, target: N): N[] {
  const path: N[] = [];
  let current: N | null = target;
  while (current !== null) {
    path.push(current);
    current = parents.get(current) ?? null;
  }
  return path.reverse();
}
