import type { Edge, NodeKey } from "../graph/types.js";

/**
 * Optional callbacks invoked at algorithm checkpoints. They replace step
 * narration inside algorithm bodies: a caller that wants a walkthrough
 * subscribes, everyone else pays nothing. Hooks run synchronously and must
 * not mutate the graph being explored.
 */
export interface AlgorithmObserver<N extends NodeKey> {
  /** A node entered the frontier. `parent` is `null` for the start node. */
  discover?(node: N, parent: N | null): void;
  /** A node was taken from the frontier and processed (or finalised). */
  visit?(node: N): void;
  /** A shortest-path search improved the tentative distance of `edge.to`. */
  relax?(edge: Edge<N>, distance: number): void;
  /** A depth-first search finished every neighbour of `node`. */
  backtrack?(node: N): void;
  /** A cycle was found; the path starts and ends on the same node. */
  cycle?(path: readonly N[]): void;
}

/** Options shared by every algorithm accepting an observer. */
export interface ObservableOptions<N extends NodeKey> {
  readonly observer?: AlgorithmObserver<N>;
}
