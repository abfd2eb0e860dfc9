import { describe, it } from "mocha";
import { expect } from "chai";

import { isTopologicalOrder, topologicalSort, topologicalSortDfs } from "../src/algorithms/topological.js";
import { Graph } from "../src/graph/model.js";

function build(edges: Array<[string, string]>): Graph<string> {
  const graph = new Graph<string>();
  for (const [from, to] of edges) {
    graph.addEdge(from, to);
  }
  return graph;
}

describe("algorithms/topological", () => {
  it("orders a DAG with Kahn's algorithm in first-in first-out order", () => {
    const graph = build([
      ["A", "B"],
      ["A", "C"],
      ["B", "D"],
      ["C", "D"],
    ]);
    expect(topologicalSort(graph)).to.deep.equal({ ok: true, order: ["A", "B", "C", "D"] });
  });

  it("orders the same DAG by reverse depth-first post-order", () => {
    const graph = build([
      ["A", "B"],
      ["A", "C"],
      ["B", "D"],
      ["C", "D"],
    ]);
    const result = topologicalSortDfs(graph);
    expect(result).to.deep.equal({ ok: true, order: ["A", "C", "B", "D"] });
    expect(result.ok && isTopologicalOrder(graph, result.order)).to.equal(true);
  });

  it("fails on a cycle without returning a partial order", () => {
    const graph = build([
      ["A", "B"],
      ["B", "C"],
      ["C", "A"],
    ]);
    expect(topologicalSort(graph)).to.deep.equal({ ok: false, remaining: ["A", "B", "C"] });
    expect(topologicalSortDfs(graph)).to.deep.equal({ ok: false, remaining: ["A", "B", "C"] });
  });

  it("reports the cyclic part and everything downstream of it as remaining", () => {
    const graph = build([
      ["X", "A"],
      ["A", "B"],
      ["B", "A"],
      ["B", "Y"],
    ]);
    expect(topologicalSort(graph)).to.deep.equal({ ok: false, remaining: ["A", "B", "Y"] });
  });

  it("treats a self-loop as a cycle and isolated nodes as free", () => {
    const looped = build([["A", "A"]]);
    expect(topologicalSort(looped).ok).to.equal(false);

    const scattered = new Graph<number>();
    scattered.addNode(3);
    scattered.addNode(1);
    expect(topologicalSort(scattered)).to.deep.equal({ ok: true, order: [3, 1] });
  });

  it("validates candidate orders", () => {
    const graph = build([
      ["A", "B"],
      ["B", "C"],
    ]);
    expect(isTopologicalOrder(graph, ["A", "B", "C"])).to.equal(true);
    expect(isTopologicalOrder(graph, ["B", "A", "C"])).to.equal(false);
    expect(isTopologicalOrder(graph, ["A", "B"])).to.equal(false);
    expect(isTopologicalOrder(graph, ["A", "A", "B", "C"])).to.equal(false);
  });
});
