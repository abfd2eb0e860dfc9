import { shortestPath } from "../algorithms/paths.js";
import { bfs, dfs } from "../algorithms/traversal.js";
import { Graph } from "../graph/model.js";

export type CrawlStrategy = "bfs" | "dfs";

export interface CrawlOptions {
  /** Defaults to `"bfs"`. */
  readonly strategy?: CrawlStrategy;
  /** Defaults to 10. */
  readonly maxPages?: number;
}

/** Directed link graph from a `page -> outgoing links` record. Pages are added in key order first. */
export function buildLinkGraph(sitemap: Readonly<Record<string, readonly string[]>>): Graph<string> {
  const graph = new Graph<string>({ name: "links" });
  for (const page of Object.keys(sitemap)) {
    graph.addNode(page);
  }
  for (const [page, links] of Object.entries(sitemap)) {
    for (const link of links) {
      graph.addEdge(page, link);
    }
  }
  return graph;
}

/**
 * Pages in the order a crawler fetches them, stopping after `maxPages`.
 * Breadth-first fetches level by level; depth-first follows the first link
 * as deep as it goes. A start page missing from the graph yields `[]`.
 */
export function crawl(graph: Graph<string>, start: string, options: CrawlOptions = {}): string[] {
  const maxPages = options.maxPages ?? 10;
  if (!graph.hasNode(start) || maxPages <= 0) {
    return [];
  }
  if ((options.strategy ?? "bfs") === "bfs") {
    return bfs(graph, start, { limit: maxPages });
  }
  return dfs(graph, start, { strategy: "iterative" }).slice(0, maxPages);
}

/** Fewest clicks from one page to another, or `null`. */
export function linkPath(graph: Graph<string>, from: string, to: string): string[] | null {
  return graph.hasNode(from) ? shortestPath(graph, from, to) : null;
}

/** Pages with no outgoing links. */
export function deadEnds(graph: Graph<string>): string[] {
  return graph.statistics().sinks;
}
