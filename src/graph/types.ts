/** Identity of a node. Keys compare with `Map` semantics, so `1` and `"1"` differ. */
export type NodeKey = string | number;

export type AttributeValue = string | number | boolean;

export type EdgeAttributes = Readonly<Record<string, AttributeValue>>;

export interface Edge<N extends NodeKey> {
  readonly from: N;
  readonly to: N;
  readonly weight: number;
  readonly attributes: EdgeAttributes;
}

export interface GraphOptions {
  /** Defaults to `true`. Undirected graphs store both arcs of every edge. */
  readonly directed?: boolean;
  readonly name?: string;
}

/** Degree of a node in a directed graph. Undirected graphs report a plain count. */
export interface DirectedDegree {
  readonly in: number;
  readonly out: number;
  readonly total: number;
}

export type NodeDegree = DirectedDegree | number;

export interface GraphStatistics<N extends NodeKey> {
  readonly nodeCount: number;
  readonly edgeCount: number;
  /** Edges present divided by the edges a simple graph of this size could hold. */
  readonly density: number;
  /** Nodes with neither incoming nor outgoing edges. */
  readonly isolated: N[];
  /** Nodes without incoming edges. */
  readonly sources: N[];
  /** Nodes without outgoing edges. */
  readonly sinks: N[];
}
