import type { AlgorithmObserver } from "./algorithms/observer.js";
import type { NodeKey } from "./graph/types.js";
import type { StructuredLogger } from "./logger.js";

/**
 * Observer logging every algorithm checkpoint as one `info` entry on
 * `logger`, so a run can be replayed step by step from the log.
 */
export function narratingObserver<N extends NodeKey>(logger: StructuredLogger): AlgorithmObserver<N> {
  return {
    discover: (node, parent) => logger.info("node_discovered", { node, parent }),
    visit: (node) => logger.info("node_visited", { node }),
    relax: (edge, distance) => logger.info("edge_relaxed", { from: edge.from, to: edge.to, distance }),
    backtrack: (node) => logger.info("node_backtracked", { node }),
    cycle: (path) => logger.info("cycle_found", { path: [...path] }),
  };
}
