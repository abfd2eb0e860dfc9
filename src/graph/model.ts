import { GraphInputError } from "./errors.js";
import type {
  Edge,
  EdgeAttributes,
  GraphOptions,
  GraphStatistics,
  NodeDegree,
  NodeKey,
} from "./types.js";

/**
 * Adjacency-list graph. Nodes and each node's outgoing edges keep insertion
 * order, which is the tie-break every traversal relies on.
 *
 * Structural no-ops never throw: inserting a duplicate node or edge and
 * removing something absent report `false`, queries on unknown nodes return
 * empty results. Only malformed values (a non-finite weight) raise
 * {@link GraphInputError}.
 */
export class Graph<N extends NodeKey = string> {
  readonly directed: boolean;
  readonly name: string;
  private readonly adjacency = new Map<N, Edge<N>[]>();

  constructor(options: GraphOptions = {}) {
    this.directed = options.directed ?? true;
    this.name = options.name ?? "graph";
  }

  get nodeCount(): number {
    return this.adjacency.size;
  }

  get edgeCount(): number {
    return this.edges().length;
  }

  addNode(node: N): boolean {
    if (this.adjacency.has(node)) {
      return false;
    }
    this.adjacency.set(node, []);
    return true;
  }

  /**
   * Adds `from -> to` (and `to -> from` on undirected graphs), inserting
   * missing endpoints first. Returns `false` when the edge already exists;
   * the stored weight is left untouched in that case.
   */
  addEdge(from: N, to: N, weight = 1, attributes: EdgeAttributes = {}): boolean {
    if (!Number.isFinite(weight)) {
      throw new GraphInputError([
        { path: `/edges/${String(from)}->${String(to)}/weight`, message: `weight must be a finite number, got ${weight}` },
      ]);
    }
    this.addNode(from);
    this.addNode(to);
    if (this.hasEdge(from, to)) {
      return false;
    }

    const frozen = Object.freeze({ ...attributes });
    this.edgeList(from).push(Object.freeze({ from, to, weight, attributes: frozen }));
    if (!this.directed && from !== to) {
      this.edgeList(to).push(Object.freeze({ from: to, to: from, weight, attributes: frozen }));
    }
    return true;
  }

  removeEdge(from: N, to: N): boolean {
    if (!this.detach(from, to)) {
      return false;
    }
    if (!this.directed && from !== to) {
      this.detach(to, from);
    }
    return true;
  }

  /** Drops the node and every edge that references it. */
  removeNode(node: N): boolean {
    if (!this.adjacency.delete(node)) {
      return false;
    }
    for (const [source, edges] of this.adjacency) {
      if (edges.some((edge) => edge.to === node)) {
        this.adjacency.set(
          source,
          edges.filter((edge) => edge.to !== node),
        );
      }
    }
    return true;
  }

  hasNode(node: N): boolean {
    return this.adjacency.has(node);
  }

  hasEdge(from: N, to: N): boolean {
    return this.getEdge(from, to) !== undefined;
  }

  getEdge(from: N, to: N): Edge<N> | undefined {
    return this.adjacency.get(from)?.find((edge) => edge.to === to);
  }

  /** Outgoing neighbours in insertion order; empty for unknown nodes. */
  neighbors(node: N): N[] {
    return this.outgoing(node).map((edge) => edge.to);
  }

  outgoing(node: N): readonly Edge<N>[] {
    return this.adjacency.get(node) ?? [];
  }

  incoming(node: N): Edge<N>[] {
    const result: Edge<N>[] = [];
    for (const edges of this.adjacency.values()) {
      for (const edge of edges) {
        if (edge.to === node) {
          result.push(edge);
        }
      }
    }
    return result;
  }

  /**
   * `{ in, out, total }` on directed graphs. Undirected graphs return the
   * number of incident edges, a self-loop counting twice.
   */
  degree(node: N): NodeDegree {
    const out = this.outgoing(node).length;
    if (!this.directed) {
      return out + (this.hasEdge(node, node) ? 1 : 0);
    }
    const inbound = this.incoming(node).length;
    return { in: inbound, out, total: inbound + out };
  }

  nodes(): N[] {
    return Array.from(this.adjacency.keys());
  }

  /** Every edge; an undirected edge is listed once, from the endpoint seen first in node order. */
  edges(): Edge<N>[] {
    const result: Edge<N>[] = [];
    if (this.directed) {
      for (const edges of this.adjacency.values()) {
        result.push(...edges);
      }
      return result;
    }

    const emitted = new Set<Edge<N>>();
    for (const edges of this.adjacency.values()) {
      for (const edge of edges) {
        const reverse = edge.from === edge.to ? undefined : this.getEdge(edge.to, edge.from);
        if (reverse && emitted.has(reverse)) {
          continue;
        }
        emitted.add(edge);
        result.push(edge);
      }
    }
    return result;
  }

  statistics(): GraphStatistics<N> {
    const inDegree = new Map<N, number>();
    for (const node of this.adjacency.keys()) {
      inDegree.set(node, 0);
    }
    for (const edges of this.adjacency.values()) {
      for (const edge of edges) {
        inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
      }
    }

    const nodes = this.nodes();
    const nodeCount = nodes.length;
    const edgeCount = this.edgeCount;
    const pairs = nodeCount * (nodeCount - 1);
    const density = pairs === 0 ? 0 : (this.directed ? edgeCount : 2 * edgeCount) / pairs;

    return {
      nodeCount,
      edgeCount,
      density,
      isolated: nodes.filter((node) => this.outgoing(node).length === 0 && inDegree.get(node) === 0),
      sources: nodes.filter((node) => inDegree.get(node) === 0),
      sinks: nodes.filter((node) => this.outgoing(node).length === 0),
    };
  }

  private edgeList(node: N): Edge<N>[] {
    let edges = this.adjacency.get(node);
    if (!edges) {
      edges = [];
      this.adjacency.set(node, edges);
    }
    return edges;
  }

  private detach(from: N, to: N): boolean {
    const edges = this.adjacency.get(from);
    const index = edges ? edges.findIndex((edge) => edge.to === to) : -1;
    if (!edges || index < 0) {
      return false;
    }
    edges.splice(index, 1);
    return true;
  }
}
