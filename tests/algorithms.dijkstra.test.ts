import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import {
  aStar,
  costFromAttribute,
  dijkstra,
  reconstructPath,
  shortestWeightedPath,
} from "../src/algorithms/dijkstra.js";
import { MinHeap } from "../src/algorithms/heap.js";
import { ERROR_CODES, NegativeWeightError } from "../src/graph/errors.js";
import { Graph } from "../src/graph/model.js";

function weighted(): Graph<string> {
  const graph = new Graph<string>();
  graph.addEdge("A", "B", 4);
  graph.addEdge("A", "C", 2);
  graph.addEdge("B", "D", 5);
  graph.addEdge("C", "D", 8);
  return graph;
}

describe("algorithms/dijkstra", () => {
  it("finds the cheapest path and the finalisation order", () => {
    const result = shortestWeightedPath(weighted(), "A", "D");
    expect(result).to.deep.equal({
      status: "found",
      distance: 9,
      path: ["A", "B", "D"],
      visitedOrder: ["A", "C", "B", "D"],
    });
  });

  it("computes distances to every node with Infinity for unreachable ones", () => {
    const graph = weighted();
    graph.addNode("Z");
    const tree = dijkstra(graph, "A");
    expect(Array.from(tree.distances)).to.deep.equal([
      ["A", 0],
      ["B", 4],
      ["C", 2],
      ["D", 9],
      ["Z", Number.POSITIVE_INFINITY],
    ]);
    expect(reconstructPath(tree.previous, "A", "D")).to.deep.equal(["A", "B", "D"]);
    expect(reconstructPath(tree.previous, "A", "Z")).to.equal(null);
  });

  it("stops early once the target is finalised", () => {
    const result = shortestWeightedPath(weighted(), "A", "C");
    expect(result.visitedOrder).to.deep.equal(["A", "C"]);
    expect(result.distance).to.equal(2);
  });

  it("reports unreachable targets distinctly from a zero-length path", () => {
    const graph = weighted();
    expect(shortestWeightedPath(graph, "D", "A")).to.deep.equal({
      status: "unreachable",
      distance: Number.POSITIVE_INFINITY,
      visitedOrder: ["D"],
    });
    expect(shortestWeightedPath(graph, "B", "B")).to.deep.equal({
      status: "found",
      distance: 0,
      path: ["B"],
      visitedOrder: ["B"],
    });
  });

  it("rejects negative costs instead of returning wrong distances", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "b", 1);
    graph.addEdge("a", "c", 5);
    graph.addEdge("c", "b", -10);
    try {
      dijkstra(graph, "a");
      expect.fail("expected a NegativeWeightError");
    } catch (error) {
      expect(error).to.be.instanceOf(NegativeWeightError);
      if (error instanceof NegativeWeightError) {
        expect(error.code).to.equal(ERROR_CODES.GRAPH_NEGATIVE_WEIGHT);
        expect(error.details).to.deep.equal({ from: "c", to: "b", cost: -10 });
      }
    }
  });

  it("rejects a negative edge past the target before stopping early", () => {
    const graph = new Graph<string>();
    graph.addEdge("A", "T", 5);
    graph.addEdge("A", "B", 10);
    graph.addEdge("B", "T", -20);
    const searches = [
      () => dijkstra(graph, "A"),
      () => shortestWeightedPath(graph, "A", "T"),
      () => aStar(graph, "A", "T", () => 0),
    ];
    for (const runSearch of searches) {
      try {
        runSearch();
        expect.fail("expected a NegativeWeightError");
      } catch (error) {
        expect(error).to.be.instanceOf(NegativeWeightError);
        if (error instanceof NegativeWeightError) {
          expect(error.details).to.deep.equal({ from: "B", to: "T", cost: -20 });
        }
      }
    }
  });

  it("ignores negative edges the source cannot reach in both modes", () => {
    const graph = new Graph<string>();
    graph.addEdge("A", "T", 1);
    graph.addEdge("X", "Y", -3);
    expect(dijkstra(graph, "A").distances.get("T")).to.equal(1);
    expect(shortestWeightedPath(graph, "A", "T")).to.deep.include({ status: "found", distance: 1 });
  });

  it("flags non-finite costs from a custom cost function", () => {
    const graph = weighted();
    try {
      shortestWeightedPath(graph, "A", "D", { cost: () => Number.NaN });
      expect.fail("expected a NegativeWeightError");
    } catch (error) {
      expect(error).to.be.instanceOf(NegativeWeightError);
      if (error instanceof NegativeWeightError) {
        expect(error.code).to.equal(ERROR_CODES.GRAPH_INVALID_WEIGHT);
      }
    }
  });

  it("reads costs from an edge attribute", () => {
    const graph = new Graph<string>();
    graph.addEdge("x", "y", 1, { price: 100 });
    graph.addEdge("x", "z", 5, { price: 10 });
    graph.addEdge("z", "y", 5, { price: 10 });
    const byPrice = shortestWeightedPath(graph, "x", "y", { cost: costFromAttribute<string>("price") });
    expect(byPrice.status === "found" ? byPrice.path : null).to.deep.equal(["x", "z", "y"]);
    expect(byPrice.distance).to.equal(20);

    const fallback = costFromAttribute<string>("missing", 7);
    const edge = graph.getEdge("x", "y");
    expect(edge ? fallback(edge, graph) : null).to.equal(7);
  });

  it("relays visit and relax events", () => {
    const relax = sinon.spy();
    const visit = sinon.spy();
    shortestWeightedPath(weighted(), "A", "D", { observer: { relax, visit } });
    expect(visit.args.map(([node]) => node)).to.deep.equal(["A", "C", "B", "D"]);
    expect(relax.args.map(([edge, distance]) => [edge.from, edge.to, distance])).to.deep.equal([
      ["A", "B", 4],
      ["A", "C", 2],
      ["C", "D", 10],
      ["B", "D", 9],
    ]);
  });

  it("matches Dijkstra with an admissible A* heuristic", () => {
    const graph = new Graph<string>({ directed: false });
    const coordinates: Record<string, [number, number]> = {
      a: [0, 0],
      b: [1, 0],
      c: [2, 0],
      d: [1, 1],
    };
    graph.addEdge("a", "b", 1);
    graph.addEdge("b", "c", 1);
    graph.addEdge("a", "d", 1.5);
    graph.addEdge("d", "c", 1.5);
    const horizontalGap = (node: string, target: string): number => {
      const [x1] = coordinates[node] ?? [0, 0];
      const [x2] = coordinates[target] ?? [0, 0];
      return Math.abs(x1 - x2);
    };
    const viaAStar = aStar(graph, "a", "c", horizontalGap);
    const viaDijkstra = shortestWeightedPath(graph, "a", "c");
    expect(viaAStar.distance).to.equal(viaDijkstra.distance);
    expect(viaAStar.status === "found" ? viaAStar.path : null).to.deep.equal(["a", "b", "c"]);
  });
});

describe("algorithms/heap", () => {
  it("pops by priority and keeps insertion order among ties", () => {
    const heap = new MinHeap<string>();
    heap.push("late", 3);
    heap.push("first-tie", 1);
    heap.push("second-tie", 1);
    heap.push("middle", 2);
    const popped: string[] = [];
    for (let entry = heap.pop(); entry; entry = heap.pop()) {
      popped.push(entry.value);
    }
    expect(popped).to.deep.equal(["first-tie", "second-tie", "middle", "late"]);
    expect(heap.isEmpty()).to.equal(true);
    expect(heap.pop()).to.equal(undefined);
  });
});
