import type { Graph } from "../graph/model.js";
import type { Edge, NodeKey } from "../graph/types.js";
import { MinHeap } from "./heap.js";
import { UnionFind } from "./unionFind.js";

export interface SpanningTree<N extends NodeKey> {
  /** Chosen edges as stored in the graph, in the order they were accepted. */
  readonly edges: Edge<N>[];
  readonly totalWeight: number;
}

/**
 * Kruskal's minimum spanning forest. Edges are taken by ascending weight
 * (ties keep graph order) and kept when they join two different sets.
 * Direction is ignored; on disconnected input the result spans every
 * component.
 */
export function kruskal<N extends NodeKey>(graph: Graph<N>): SpanningTree<N> {
  const sets = new UnionFind<N>(graph.nodes());
  const candidates = graph.edges().sort((left, right) => left.weight - right.weight);
  const edges: Edge<N>[] = [];
  for (const edge of candidates) {
    if (sets.union(edge.from, edge.to)) {
      edges.push(edge);
    }
    if (edges.length === graph.nodeCount - 1) {
      break;
    }
  }
  return { edges, totalWeight: sumWeights(edges) };
}

/**
 * Prim's algorithm grown from `start` (the first node by default). Only the
 * start's component is covered. Direction is ignored.
 */
export function prim<N extends NodeKey>(graph: Graph<N>, start?: N): SpanningTree<N> {
  const root = start ?? graph.nodes()[0];
  if (root === undefined || !graph.hasNode(root)) {
    return { edges: [], totalWeight: 0 };
  }

  const inTree = new Set<N>();
  const frontier = new MinHeap<{ edge: Edge<N>; next: N }>();
  const edges: Edge<N>[] = [];

  const grow = (node: N): void => {
    inTree.add(node);
    for (const link of incidentLinks(graph, node)) {
      if (!inTree.has(link.next)) {
        frontier.push(link, link.edge.weight);
      }
    }
  };

  grow(root);
  while (!frontier.isEmpty()) {
    const entry = frontier.pop();
    if (!entry || inTree.has(entry.value.next)) {
      continue;
    }
    edges.push(entry.value.edge);
    grow(entry.value.next);
  }
  return { edges, totalWeight: sumWeights(edges) };
}

/** Edges touching `node` with the endpoint on the far side; incoming arcs count on directed graphs. */
function incidentLinks<N extends NodeKey>(graph: Graph<N>, node: N): Array<{ edge: Edge<N>; next: N }> {
  const links = graph.outgoing(node).map((edge) => ({ edge, next: edge.to }));
  if (graph.directed) {
    for (const edge of graph.incoming(node)) {
      links.push({ edge, next: edge.from });
    }
  }
  return links;
}

function sumWeights<N extends NodeKey>(edges: readonly Edge<N>[]): number {
  return edges.reduce((total, edge) => total + edge.weight, 0);
}
