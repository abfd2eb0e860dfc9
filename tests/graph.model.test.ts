import { describe, it } from "mocha";
import { expect } from "chai";

import { ERROR_CODES, GraphInputError } from "../src/graph/errors.js";
import { Graph } from "../src/graph/model.js";

describe("graph/model", () => {
  it("defaults to a directed graph and reports structural no-ops as false", () => {
    const graph = new Graph<number>();
    expect(graph.directed).to.equal(true);
    expect(graph.addNode(1)).to.equal(true);
    expect(graph.addNode(1)).to.equal(false);
    expect(graph.addEdge(1, 2)).to.equal(true);
    expect(graph.addEdge(1, 2, 7)).to.equal(false);
    expect(graph.getEdge(1, 2)?.weight).to.equal(1);
    expect(graph.removeEdge(2, 1)).to.equal(false);
    expect(graph.removeNode(9)).to.equal(false);
    expect(graph.nodes()).to.deep.equal([1, 2]);
  });

  it("inserts missing endpoints and keeps neighbour insertion order", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "c");
    graph.addEdge("a", "b");
    expect(graph.nodes()).to.deep.equal(["a", "c", "b"]);
    expect(graph.neighbors("a")).to.deep.equal(["c", "b"]);
    expect(graph.neighbors("missing")).to.deep.equal([]);
    expect(graph.hasEdge("missing", "a")).to.equal(false);
  });

  it("stores both arcs on undirected graphs and lists each edge once", () => {
    const graph = new Graph<number>({ directed: false });
    graph.addEdge(0, 1, 3);
    graph.addEdge(1, 2);
    expect(graph.hasEdge(1, 0)).to.equal(true);
    expect(graph.getEdge(1, 0)?.weight).to.equal(3);
    expect(graph.addEdge(1, 0)).to.equal(false);
    expect(graph.edgeCount).to.equal(2);
    expect(graph.edges().map((edge) => [edge.from, edge.to])).to.deep.equal([
      [0, 1],
      [1, 2],
    ]);

    expect(graph.removeEdge(1, 0)).to.equal(true);
    expect(graph.hasEdge(0, 1)).to.equal(false);
    expect(graph.edgeCount).to.equal(1);
  });

  it("accepts self-loops, stored once and counted twice in undirected degrees", () => {
    const graph = new Graph<string>({ directed: false });
    graph.addEdge("x", "x");
    graph.addEdge("x", "y");
    expect(graph.outgoing("x")).to.have.length(2);
    expect(graph.degree("x")).to.equal(3);
    expect(graph.degree("y")).to.equal(1);
    expect(graph.edgeCount).to.equal(2);
  });

  it("reports in, out and total degree on directed graphs", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "b");
    graph.addEdge("c", "b");
    graph.addEdge("b", "d");
    expect(graph.degree("b")).to.deep.equal({ in: 2, out: 1, total: 3 });
    expect(graph.degree("unknown")).to.deep.equal({ in: 0, out: 0, total: 0 });
    expect(graph.incoming("b").map((edge) => edge.from)).to.deep.equal(["a", "c"]);
  });

  it("purges every edge referencing a removed node", () => {
    const graph = new Graph<number>();
    graph.addEdge(0, 1);
    graph.addEdge(1, 2);
    graph.addEdge(2, 1);
    graph.addEdge(0, 2);
    expect(graph.removeNode(1)).to.equal(true);
    expect(graph.hasNode(1)).to.equal(false);
    expect(graph.edges().map((edge) => [edge.from, edge.to])).to.deep.equal([[0, 2]]);
  });

  it("rejects non-finite weights with a typed input error", () => {
    const graph = new Graph<string>();
    try {
      graph.addEdge("a", "b", Number.NaN);
      expect.fail("expected a GraphInputError");
    } catch (error) {
      expect(error).to.be.instanceOf(GraphInputError);
      if (error instanceof GraphInputError) {
        expect(error.code).to.equal(ERROR_CODES.GRAPH_INVALID_INPUT);
        expect(error.violations[0]?.path).to.equal("/edges/a->b/weight");
      }
    }
    expect(graph.nodeCount).to.equal(0);
  });

  it("freezes stored edges so callers cannot rewrite weights", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "b", 2, { label: "ab" });
    const edge = graph.getEdge("a", "b");
    expect(Object.isFrozen(edge)).to.equal(true);
    expect(Object.isFrozen(edge?.attributes)).to.equal(true);
  });

  it("summarises isolated nodes, sources, sinks and density", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "b");
    graph.addEdge("b", "c");
    graph.addNode("lonely");
    expect(graph.statistics()).to.deep.equal({
      nodeCount: 4,
      edgeCount: 2,
      density: 2 / 12,
      isolated: ["lonely"],
      sources: ["a", "lonely"],
      sinks: ["c", "lonely"],
    });

    const undirected = new Graph<number>({ directed: false });
    undirected.addEdge(0, 1);
    expect(undirected.statistics().density).to.equal(1);
    expect(new Graph().statistics().density).to.equal(0);
  });
});
