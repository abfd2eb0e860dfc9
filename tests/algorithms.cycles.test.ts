import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import {
  detectCycle,
  findDirectedCycle,
  findUndirectedCycle,
  hasDirectedCycle,
  hasUndirectedCycle,
  listCycles,
  shortestCycle,
} from "../src/algorithms/cycles.js";
import { Graph } from "../src/graph/model.js";

function directedRing(): Graph<number> {
  const graph = new Graph<number>();
  graph.addEdge(0, 1);
  graph.addEdge(1, 2);
  graph.addEdge(2, 0);
  return graph;
}

function diamondDag(): Graph<string> {
  const graph = new Graph<string>();
  graph.addEdge("a", "b");
  graph.addEdge("a", "c");
  graph.addEdge("b", "d");
  graph.addEdge("c", "d");
  return graph;
}

describe("algorithms/cycles", () => {
  it("closes the directed cycle path with both strategies", () => {
    const graph = directedRing();
    expect(findDirectedCycle(graph)).to.deep.equal([0, 1, 2, 0]);
    expect(findDirectedCycle(graph, { strategy: "iterative" })).to.deep.equal([0, 1, 2, 0]);
    expect(hasDirectedCycle(graph)).to.equal(true);
  });

  it("does not mistake converging directed paths for a cycle", () => {
    const graph = diamondDag();
    expect(findDirectedCycle(graph)).to.equal(null);
    expect(findDirectedCycle(graph, { strategy: "iterative" })).to.equal(null);
    expect(detectCycle(graph)).to.deep.equal({ hasCycle: false, cycle: null });
  });

  it("finds cycles in every component, not only the first", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "b");
    graph.addEdge("x", "y");
    graph.addEdge("y", "x");
    expect(findDirectedCycle(graph)).to.deep.equal(["x", "y", "x"]);
  });

  it("ignores the edge back to the parent on undirected graphs", () => {
    const path = new Graph<number>({ directed: false });
    path.addEdge(0, 1);
    path.addEdge(1, 2);
    expect(hasUndirectedCycle(path)).to.equal(false);

    const triangle = new Graph<number>({ directed: false });
    triangle.addEdge(0, 1);
    triangle.addEdge(1, 2);
    triangle.addEdge(2, 0);
    expect(findUndirectedCycle(triangle)).to.deep.equal([0, 1, 2, 0]);
    expect(findUndirectedCycle(triangle, { strategy: "iterative" })).to.deep.equal([0, 1, 2, 0]);
    expect(detectCycle(triangle)).to.deep.equal({ hasCycle: true, cycle: [0, 1, 2, 0] });
  });

  it("notifies the observer with the closed path", () => {
    const cycle = sinon.spy();
    detectCycle(directedRing(), { observer: { cycle } });
    expect(cycle.calledOnceWithExactly([0, 1, 2, 0])).to.equal(true);
  });

  it("lists back-edge cycles up to the limit", () => {
    const graph = new Graph<number>();
    graph.addEdge(0, 1);
    graph.addEdge(1, 0);
    graph.addEdge(1, 2);
    graph.addEdge(2, 1);
    expect(listCycles(graph)).to.deep.equal([
      [0, 1, 0],
      [1, 2, 1],
    ]);
    expect(listCycles(graph, 1)).to.deep.equal([[0, 1, 0]]);
    expect(listCycles(diamondDag())).to.deep.equal([]);
    expect(listCycles(graph, 0)).to.deep.equal([]);
  });

  it("lists each undirected cycle once and never the edge back to the parent", () => {
    const triangle = new Graph<number>({ directed: false });
    triangle.addEdge(0, 1);
    triangle.addEdge(1, 2);
    triangle.addEdge(2, 0);
    expect(listCycles(triangle)).to.deep.equal([[0, 1, 2, 0]]);

    const path = new Graph<number>({ directed: false });
    path.addEdge(0, 1);
    path.addEdge(1, 2);
    expect(listCycles(path)).to.deep.equal([]);
  });

  it("finds the shortest directed cycle, self-loops included", () => {
    const graph = new Graph<number>();
    graph.addEdge(0, 1);
    graph.addEdge(1, 2);
    graph.addEdge(2, 3);
    graph.addEdge(3, 0);
    graph.addEdge(2, 0);
    expect(shortestCycle(graph)).to.deep.equal([0, 1, 2, 0]);

    const loop = new Graph<string>();
    loop.addEdge("a", "b");
    loop.addEdge("a", "a");
    expect(shortestCycle(loop)).to.deep.equal(["a", "a"]);
  });

  it("finds the shortest undirected cycle and returns null on trees", () => {
    const graph = new Graph<number>({ directed: false });
    graph.addEdge(0, 1);
    graph.addEdge(1, 2);
    graph.addEdge(2, 0);
    graph.addEdge(2, 3);
    expect(shortestCycle(graph)).to.deep.equal([0, 1, 2, 0]);

    const tree = new Graph<number>({ directed: false });
    tree.addEdge(0, 1);
    tree.addEdge(1, 2);
    expect(shortestCycle(tree)).to.equal(null);
  });
});
