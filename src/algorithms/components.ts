import type { Graph } from "../graph/model.js";
import type { NodeKey } from "../graph/types.js";
import { UnionFind } from "./unionFind.js";

export type ComponentMethod = "dfs" | "bfs" | "union-find";

export interface ComponentOptions {
  /** Defaults to `"dfs"`. Every method returns the same partition. */
  readonly method?: ComponentMethod;
}

export interface ConnectivitySummary<N extends NodeKey> {
  readonly componentCount: number;
  readonly isConnected: boolean;
  /** Component sizes, largest first. */
  readonly sizes: number[];
  readonly largestComponentSize: number;
  /** Nodes forming a component on their own. */
  readonly isolated: N[];
  /** Share of the nodes inside the largest component; 1 for an empty graph. */
  readonly connectivityRatio: number;
}

/**
 * Partition of the nodes into connected components. Edge direction is
 * ignored, so on directed graphs these are the weakly connected components;
 * use {@link stronglyConnectedComponents} for mutual reachability.
 *
 * Components are ordered by their first node in graph order. Members follow
 * discovery order for `dfs`/`bfs` and graph order for `union-find`.
 */
export function connectedComponents<N extends NodeKey>(graph: Graph<N>, options: ComponentOptions = {}): N[][] {
  switch (options.method ?? "dfs") {
    case "union-find":
      return unionFindComponents(graph);
    case "bfs":
      return traversalComponents(graph, "bfs");
    default:
      return traversalComponents(graph, "dfs");
  }
}

/** `true` when every node reaches every other ignoring direction; an empty graph counts as connected. */
export function isConnected<N extends NodeKey>(graph: Graph<N>): boolean {
  return connectedComponents(graph).length <= 1;
}

export function connectivitySummary<N extends NodeKey>(graph: Graph<N>): ConnectivitySummary<N> {
  const components = connectedComponents(graph);
  const sizes = components.map((component) => component.length).sort((left, right) => right - left);
  const largestComponentSize = sizes[0] ?? 0;
  return {
    componentCount: components.length,
    isConnected: components.length <= 1,
    sizes,
    largestComponentSize,
    isolated: components.filter((component) => component.length === 1).flat(),
    connectivityRatio: graph.nodeCount === 0 ? 1 : largestComponentSize / graph.nodeCount,
  };
}

/**
 * Processes every edge once through a {@link UnionFind}. Each edge is read as
 * symmetric whatever the graph's direction.
 */
function unionFindComponents<N extends NodeKey>(graph: Graph<N>): N[][] {
  const sets = new UnionFind<N>(graph.nodes());
  for (const edge of graph.edges()) {
    sets.union(edge.from, edge.to);
  }
  return sets.groups();
}

function traversalComponents<N extends NodeKey>(graph: Graph<N>, order: "dfs" | "bfs"): N[][] {
  const links = undirectedLinks(graph);
  const assigned = new Set<N>();
  const components: N[][] = [];

  for (const root of graph.nodes()) {
    if (assigned.has(root)) {
      continue;
    }
    const component = order === "bfs" ? collectBreadthFirst(root, links, assigned) : collectDepthFirst(root, links, assigned);
    components.push(component);
  }
  return components;
}

function collectDepthFirst<N extends NodeKey>(root: N, links: (node: N) => readonly N[], assigned: Set<N>): N[] {
  const component: N[] = [];
  const stack: N[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || assigned.has(node)) {
      continue;
    }
    assigned.add(node);
    component.push(node);
    const neighbors = links(node);
    for (let index = neighbors.length - 1; index >= 0; index -= 1) {
      if (!assigned.has(neighbors[index])) {
        stack.push(neighbors[index]);
      }
    }
  }
  return component;
}

function collectBreadthFirst<N extends NodeKey>(root: N, links: (node: N) => readonly N[], assigned: Set<N>): N[] {
  assigned.add(root);
  const component: N[] = [root];
  for (let head = 0; head < component.length; head += 1) {
    for (const neighbor of links(component[head])) {
      if (!assigned.has(neighbor)) {
        assigned.add(neighbor);
        component.push(neighbor);
      }
    }
  }
  return component;
}

/** Neighbour lookup that follows edges both ways; outgoing neighbours come first. */
function undirectedLinks<N extends NodeKey>(graph: Graph<N>): (node: N) => readonly N[] {
  if (!graph.directed) {
    return (node) => graph.neighbors(node);
  }
  const links = new Map<N, Set<N>>();
  for (const node of graph.nodes()) {
    links.set(node, new Set(graph.neighbors(node)));
  }
  for (const edge of graph.edges()) {
    links.get(edge.to)?.add(edge.from);
  }
  return (node) => Array.from(links.get(node) ?? []);
}
