import { costFromAttribute, shortestWeightedPath } from "../algorithms/dijkstra.js";
import { findAllPaths } from "../algorithms/paths.js";
import { Graph } from "../graph/model.js";
import type { Edge } from "../graph/types.js";

export type FlightMetric = "distance" | "price" | "duration";

export interface FlightDetails {
  readonly distance: number;
  readonly price: number;
  readonly duration: number;
}

export interface RouteSummary extends FlightDetails {
  readonly path: string[];
  /** Intermediate airports, so a direct flight has 0. */
  readonly stops: number;
}

export interface Hub {
  readonly airport: string;
  readonly connections: number;
}

const METRICS: readonly FlightMetric[] = ["distance", "price", "duration"];

/**
 * One-way flights between airport codes. The edge weight is the distance;
 * every flight also carries its `distance`, `price` and `duration` as
 * attributes so any of them can drive a search.
 */
export class FlightNetwork {
  readonly graph = new Graph<string>({ name: "flights" });

  addAirport(code: string): boolean {
    return this.graph.addNode(code);
  }

  addFlight(from: string, to: string, details: FlightDetails): boolean {
    const { distance, price, duration } = details;
    return this.graph.addEdge(from, to, distance, { distance, price, duration });
  }

  /** Route minimising the total of `metric`; `null` when unknown or unreachable. */
  bestRoute(from: string, to: string, metric: FlightMetric = "distance"): RouteSummary | null {
    if (!this.graph.hasNode(from) || !this.graph.hasNode(to)) {
      return null;
    }
    const result = shortestWeightedPath(this.graph, from, to, { cost: costFromAttribute<string>(metric) });
    return result.status === "found" ? this.summarise(result.path) : null;
  }

  /**
   * Every route without repeated airports taking at most `maxStops` flights;
   * each flight counts as one stop, the final landing included.
   */
  routesWithinStops(from: string, to: string, maxStops = 3): RouteSummary[] {
    if (from === to) {
      return [];
    }
    return findAllPaths(this.graph, from, to, { maxEdges: maxStops }).map((path) => this.summarise(path));
  }

  /** Airports ranked by arriving plus departing flights; ties keep insertion order. */
  hubs(limit = 5): Hub[] {
    return this.graph
      .nodes()
      .map((airport) => {
        const degree = this.graph.degree(airport);
        return { airport, connections: typeof degree === "number" ? degree : degree.total };
      })
      .sort((left, right) => right.connections - left.connections)
      .slice(0, limit);
  }

  /** Totals along `path`. Hops without a flight contribute nothing. */
  summarise(path: string[]): RouteSummary {
    const totals: Record<FlightMetric, number> = { distance: 0, price: 0, duration: 0 };
    for (let index = 1; index < path.length; index += 1) {
      const edge = this.graph.getEdge(path[index - 1], path[index]);
      if (!edge) {
        continue;
      }
      for (const metric of METRICS) {
        totals[metric] += metricOf(edge, metric);
      }
    }
    return { path, ...totals, stops: Math.max(0, path.length - 2) };
  }
}

function metricOf(edge: Edge<string>, metric: FlightMetric): number {
  const value = edge.attributes[metric];
  return typeof value === "number" ? value : 0;
}
