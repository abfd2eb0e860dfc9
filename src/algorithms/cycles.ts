import type { Graph } from "../graph/model.js";
import type { NodeKey } from "../graph/types.js";
import type { ObservableOptions } from "./observer.js";
import { tracePath } from "./paths.js";
import type { DfsStrategy } from "./traversal.js";

export interface CycleSearchOptions<N extends NodeKey> extends ObservableOptions<N> {
  /** Defaults to `"recursive"`. Both strategies report the same cycle. */
  readonly strategy?: DfsStrategy;
}

export interface CycleDetectionResult<N extends NodeKey> {
  readonly hasCycle: boolean;
  /** Closed path (first node repeated at the end), or `null`. */
  readonly cycle: N[] | null;
}

/** Colour of a node during the search; absent from the map means unvisited. */
type Colour = "active" | "done";

type Verdict = "descend" | "cycle" | "skip";

/** Receives each closed cycle as the search meets it; `true` ends the search. */
type CycleSink<N extends NodeKey> = (cycle: N[]) => boolean;

/** Decides what an edge `node -> neighbor` means for the search. */
type EdgeJudge<N extends NodeKey> = (neighbor: N, parent: N | null, colour: Colour | undefined) => Verdict;

/**
 * Three-colour depth-first search: meeting an `active` node (one still on the
 * current path) is a back edge and closes a cycle. Every node is used as a
 * root, so cycles in any component are found.
 */
const directedJudge = <N extends NodeKey>(_neighbor: N, _parent: N | null, colour: Colour | undefined): Verdict => {
  if (colour === "active") {
    return "cycle";
  }
  return colour === undefined ? "descend" : "skip";
};

/**
 * Parent-tracking search: an active neighbour other than the node we came
 * from closes a cycle. Going back over the edge to the parent is not one,
 * which is why undirected graphs cannot reuse the three-colour rule. A `done`
 * neighbour is a finished descendant whose side of the edge already closed
 * the same cycle.
 */
const undirectedJudge = <N extends NodeKey>(neighbor: N, parent: N | null, colour: Colour | undefined): Verdict => {
  if (colour === undefined) {
    return "descend";
  }
  return colour === "active" && neighbor !== parent ? "cycle" : "skip";
};

export function findDirectedCycle<N extends NodeKey>(
  graph: Graph<N>,
  options: CycleSearchOptions<N> = {},
): N[] | null {
  return reportCycle(firstCycle(graph, directedJudge, options.strategy), options);
}

export function hasDirectedCycle<N extends NodeKey>(graph: Graph<N>): boolean {
  return findDirectedCycle(graph) !== null;
}

export function findUndirectedCycle<N extends NodeKey>(
  graph: Graph<N>,
  options: CycleSearchOptions<N> = {},
): N[] | null {
  return reportCycle(firstCycle(graph, undirectedJudge, options.strategy), options);
}

export function hasUndirectedCycle<N extends NodeKey>(graph: Graph<N>): boolean {
  return findUndirectedCycle(graph) !== null;
}

/** Picks the directed or undirected rule from the graph itself. */
export function detectCycle<N extends NodeKey>(
  graph: Graph<N>,
  options: CycleSearchOptions<N> = {},
): CycleDetectionResult<N> {
  const cycle = graph.directed ? findDirectedCycle(graph, options) : findUndirectedCycle(graph, options);
  return { hasCycle: cycle !== null, cycle };
}

/**
 * Collects the cycle closed by every back edge met during one depth-first
 * pass, up to `limit`. This is not an enumeration of all simple cycles: a
 * cycle only reachable through an already finished node is not reported.
 */
export function listCycles<N extends NodeKey>(graph: Graph<N>, limit = 20): N[][] {
  const cycles: N[][] = [];
  if (limit > 0) {
    searchRecursively(graph, graph.directed ? directedJudge : undirectedJudge, (cycle) => {
      cycles.push(cycle);
      return cycles.length >= limit;
    });
  }
  return cycles;
}

/**
 * A cycle with the fewest edges, as a closed path, or `null` on acyclic
 * input. Runs one breadth-first search per node, so O(V·(V+E)).
 */
export function shortestCycle<N extends NodeKey>(graph: Graph<N>): N[] | null {
  let best: N[] | null = null;
  for (const start of graph.nodes()) {
    const candidate = graph.directed ? shortestDirectedCycleThrough(graph, start) : shortestUndirectedCycleFrom(graph, start);
    if (candidate && (best === null || candidate.length < best.length)) {
      best = candidate;
    }
  }
  return best;
}

function shortestDirectedCycleThrough<N extends NodeKey>(graph: Graph<N>, start: N): N[] | null {
  const parents = new Map<N, N | null>([[start, null]]);
  const queue: N[] = [start];
  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    for (const neighbor of graph.neighbors(node)) {
      if (neighbor === start) {
        return [...tracePath(parents, node), start];
      }
      if (!parents.has(neighbor)) {
        parents.set(neighbor, node);
        queue.push(neighbor);
      }
    }
  }
  return null;
}

/**
 * Closes the first non-tree edge met by a BFS from `start`. The closed walk
 * can repeat a prefix when `start` is not on the cycle, but the minimum over
 * every start is always a simple cycle.
 */
function shortestUndirectedCycleFrom<N extends NodeKey>(graph: Graph<N>, start: N): N[] | null {
  const parents = new Map<N, N | null>([[start, null]]);
  const depth = new Map<N, number>([[start, 0]]);
  const queue: N[] = [start];
  let best: N[] | null = null;
  let bestLength = Number.POSITIVE_INFINITY;

  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    const nodeDepth = depth.get(node) ?? 0;
    if (2 * nodeDepth >= bestLength) {
      break;
    }
    for (const neighbor of graph.neighbors(node)) {
      if (neighbor === node) {
        return [node, node];
      }
      if (neighbor === parents.get(node)) {
        continue;
      }
      const neighborDepth = depth.get(neighbor);
      if (neighborDepth === undefined) {
        parents.set(neighbor, node);
        depth.set(neighbor, nodeDepth + 1);
        queue.push(neighbor);
        continue;
      }
      const length = nodeDepth + neighborDepth + 1;
      if (length < bestLength) {
        bestLength = length;
        best = [...tracePath(parents, node), ...tracePath(parents, neighbor).reverse()];
      }
    }
  }
  return best;
}

function firstCycle<N extends NodeKey>(
  graph: Graph<N>,
  judge: EdgeJudge<N>,
  strategy: DfsStrategy | undefined,
): N[] | null {
  const found: N[][] = [];
  const keepFirst: CycleSink<N> = (cycle) => {
    found.push(cycle);
    return true;
  };
  if (strategy === "iterative") {
    searchIteratively(graph, judge, keepFirst);
  } else {
    searchRecursively(graph, judge, keepFirst);
  }
  return found[0] ?? null;
}

/**
 * Depth-first walk from every unvisited root. Each edge the judge calls a
 * cycle is closed against the current path and handed to `sink`; the walk
 * then carries on past it unless the sink asks to stop.
 */
function searchRecursively<N extends NodeKey>(graph: Graph<N>, judge: EdgeJudge<N>, sink: CycleSink<N>): void {
  const colours = new Map<N, Colour>();
  const path: N[] = [];
  let stopped = false;

  const visit = (node: N, parent: N | null): void => {
    colours.set(node, "active");
    path.push(node);
    for (const neighbor of graph.neighbors(node)) {
      if (stopped) {
        return;
      }
      const verdict = judge(neighbor, parent, colours.get(neighbor));
      if (verdict === "cycle") {
        stopped = sink(closeCycle(path, neighbor));
      } else if (verdict === "descend") {
        visit(neighbor, node);
      }
    }
    colours.set(node, "done");
    path.pop();
  };

  for (const root of graph.nodes()) {
    if (stopped) {
      return;
    }
    if (!colours.has(root)) {
      visit(root, null);
    }
  }
}

interface Frame<N extends NodeKey> {
  readonly node: N;
  readonly parent: N | null;
  readonly neighbors: N[];
  next: number;
}

/** Same walk as {@link searchRecursively}, with explicit frames instead of calls. */
function searchIteratively<N extends NodeKey>(graph: Graph<N>, judge: EdgeJudge<N>, sink: CycleSink<N>): void {
  const colours = new Map<N, Colour>();
  const path: N[] = [];

  for (const root of graph.nodes()) {
    if (colours.has(root)) {
      continue;
    }
    colours.set(root, "active");
    path.push(root);
    const frames: Frame<N>[] = [{ node: root, parent: null, neighbors: graph.neighbors(root), next: 0 }];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.next >= frame.neighbors.length) {
        colours.set(frame.node, "done");
        path.pop();
        frames.pop();
        continue;
      }
      const neighbor = frame.neighbors[frame.next];
      frame.next += 1;
      const verdict = judge(neighbor, frame.parent, colours.get(neighbor));
      if (verdict === "cycle") {
        if (sink(closeCycle(path, neighbor))) {
          return;
        }
      } else if (verdict === "descend") {
        colours.set(neighbor, "active");
        path.push(neighbor);
        frames.push({ node: neighbor, parent: frame.node, neighbors: graph.neighbors(neighbor), next: 0 });
      }
    }
  }
}

function closeCycle<N extends NodeKey>(path: readonly N[], repeated: N): N[] {
  return [...path.slice(path.indexOf(repeated)), repeated];
}

function reportCycle<N extends NodeKey>(cycle: N[] | null, options: ObservableOptions<N>): N[] | null {
  if (cycle) {
    options.observer?.cycle?.(cycle);
  }
  return cycle;
}
