import { NegativeWeightError } from "../graph/errors.js";
import type { Graph } from "../graph/model.js";
import type { Edge, NodeKey } from "../graph/types.js";
import { MinHeap } from "./heap.js";
import type { ObservableOptions } from "./observer.js";
import { reachable } from "./traversal.js";

/**
 * Cost of traversing an edge. Must return a non-negative finite number;
 * anything else on an edge reachable from the source aborts the search with
 * {@link NegativeWeightError}, in the single-target modes too.
 */
export type EdgeCostFunction<N extends NodeKey> = (edge: Edge<N>, graph: Graph<N>) => number;

/** Estimated remaining cost from `node` to `target`, used by {@link aStar}. */
export type Heuristic<N extends NodeKey> = (node: N, target: N) => number;

export interface DijkstraOptions<N extends NodeKey> extends ObservableOptions<N> {
  /** Defaults to the edge weight. */
  readonly cost?: EdgeCostFunction<N>;
}

/** Result of the all-nodes search. */
export interface ShortestPathTree<N extends NodeKey> {
  /** Every node of the graph (and the source); `Infinity` when unreachable. */
  readonly distances: Map<N, number>;
  /** Predecessor on a shortest path, for every reached node except the source. */
  readonly previous: Map<N, N>;
  /** Nodes in the order their distance was finalised. */
  readonly order: N[];
}

export type WeightedPathResult<N extends NodeKey> =
  | {
      readonly status: "found";
      readonly distance: number;
      readonly path: N[];
      readonly visitedOrder: N[];
    }
  | {
      readonly status: "unreachable";
      readonly distance: number;
      readonly visitedOrder: N[];
    };

/**
 * Shortest weighted distance from `source` to every node. A node's distance is
 * final the first time it leaves the heap; later, stale entries for it are
 * skipped.
 */
export function dijkstra<N extends NodeKey>(
  graph: Graph<N>,
  source: N,
  options: DijkstraOptions<N> = {},
): ShortestPathTree<N> {
  return search(graph, source, undefined, options, undefined);
}

/**
 * Single-target variant that stops once `target` is finalised. The reported
 * distance equals the one {@link dijkstra} computes for the same target.
 */
export function shortestWeightedPath<N extends NodeKey>(
  graph: Graph<N>,
  source: N,
  target: N,
  options: DijkstraOptions<N> = {},
): WeightedPathResult<N> {
  return toPathResult(search(graph, source, target, options, undefined), source, target);
}

/**
 * A* search. With a consistent heuristic (never overestimating, and obeying
 * the triangle inequality along edges) the path is optimal while typically
 * finalising fewer nodes than {@link shortestWeightedPath}.
 */
export function aStar<N extends NodeKey>(
  graph: Graph<N>,
  source: N,
  target: N,
  heuristic: Heuristic<N>,
  options: DijkstraOptions<N> = {},
): WeightedPathResult<N> {
  return toPathResult(search(graph, source, target, options, heuristic), source, target);
}

/** Walks `previous` back from `target`; `null` when the target was never reached. */
export function reconstructPath<N extends NodeKey>(previous: ReadonlyMap<N, N>, source: N, target: N): N[] | null {
  if (source === target) {
    return [source];
  }
  const path: N[] = [target];
  let current = target;
  while (current !== source) {
    const predecessor = previous.get(current);
    if (predecessor === undefined || path.length > previous.size) {
      return null;
    }
    path.push(predecessor);
    current = predecessor;
  }
  return path.reverse();
}

/**
 * Builds a cost function reading a numeric edge attribute, e.g. `price` on a
 * flight. Edges without the attribute fall back to `defaultValue`, or to
 * their weight when no default is given.
 */
export function costFromAttribute<N extends NodeKey>(attribute: string, defaultValue?: number): EdgeCostFunction<N> {
  return (edge) => {
    const raw = edge.attributes[attribute];
    if (raw === undefined) {
      return defaultValue ?? edge.weight;
    }
    return typeof raw === "number" ? raw : Number(raw);
  };
}

function search<N extends NodeKey>(
  graph: Graph<N>,
  source: N,
  target: N | undefined,
  options: DijkstraOptions<N>,
  heuristic: Heuristic<N> | undefined,
): ShortestPathTree<N> {
  const { observer } = options;
  const cost = validatedCost(options.cost);
  const estimate = (node: N): number => (heuristic && target !== undefined ? heuristic(node, target) : 0);
  if (target !== undefined) {
    // Stopping at the target leaves edges unrelaxed; check the costs of every
    // reachable edge first so both modes reject the same graphs.
    for (const node of reachable(graph, source)) {
      for (const edge of graph.outgoing(node)) {
        cost(edge, graph);
      }
    }
  }

  const distances = new Map<N, number>();
  for (const node of graph.nodes()) {
    distances.set(node, Number.POSITIVE_INFINITY);
  }
  distances.set(source, 0);
  const previous = new Map<N, N>();
  const finalised = new Set<N>();
  const order: N[] = [];

  const frontier = new MinHeap<N>();
  frontier.push(source, estimate(source));
  observer?.discover?.(source, null);

  while (!frontier.isEmpty()) {
    const entry = frontier.pop();
    if (!entry || finalised.has(entry.value)) {
      continue;
    }
    const node = entry.value;
    finalised.add(node);
    order.push(node);
    observer?.visit?.(node);
    if (node === target) {
      break;
    }

    const base = distances.get(node) ?? Number.POSITIVE_INFINITY;
    for (const edge of graph.outgoing(node)) {
      // Validated even for edges into finalised nodes.
      const tentative = base + cost(edge, graph);
      if (finalised.has(edge.to)) {
        continue;
      }
      if (tentative < (distances.get(edge.to) ?? Number.POSITIVE_INFINITY)) {
        const discovered = !previous.has(edge.to);
        distances.set(edge.to, tentative);
        previous.set(edge.to, node);
        frontier.push(edge.to, tentative + estimate(edge.to));
        if (discovered) {
          observer?.discover?.(edge.to, node);
        }
        observer?.relax?.(edge, tentative);
      }
    }
  }

  return { distances, previous, order };
}

function validatedCost<N extends NodeKey>(cost: EdgeCostFunction<N> | undefined): EdgeCostFunction<N> {
  const compute: EdgeCostFunction<N> = cost ?? ((edge) => edge.weight);
  return (edge, graph) => {
    const value = compute(edge, graph);
    if (!Number.isFinite(value) || value < 0) {
      throw new NegativeWeightError(edge.from, edge.to, value);
    }
    return value;
  };
}

function toPathResult<N extends NodeKey>(tree: ShortestPathTree<N>, source: N, target: N): WeightedPathResult<N> {
  const distance = tree.distances.get(target) ?? Number.POSITIVE_INFINITY;
  const path = Number.isFinite(distance) ? reconstructPath(tree.previous, source, target) : null;
  if (path === null) {
    return { status: "unreachable", distance: Number.POSITIVE_INFINITY, visitedOrder: tree.order };
  }
  return { status: "found", distance, path, visitedOrder: tree.order };
}
