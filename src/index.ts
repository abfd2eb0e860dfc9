export * from "./graph/types.js";
export * from "./graph/errors.js";
export { Graph } from "./graph/model.js";
export * from "./graph/descriptor.js";

export type { AlgorithmObserver, ObservableOptions } from "./algorithms/observer.js";
export { MinHeap } from "./algorithms/heap.js";
export * from "./algorithms/traversal.js";
export * from "./algorithms/paths.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/cycles.js";
export { UnionFind } from "./algorithms/unionFind.js";
export * from "./algorithms/components.js";
export * from "./algorithms/tarjan.js";
export * from "./algorithms/topological.js";
export * from "./algorithms/spanningTree.js";

export * from "./scenarios/maze.js";
export * from "./scenarios/social.js";
export * from "./scenarios/flights.js";
export * from "./scenarios/crawler.js";

export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { narratingObserver } from "./narration.js";
export { loadSettings, type Settings } from "./config/settings.js";
