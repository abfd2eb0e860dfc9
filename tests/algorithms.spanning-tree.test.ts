import { describe, it } from "mocha";
import { expect } from "chai";

import { kruskal, prim, type SpanningTree } from "../src/algorithms/spanningTree.js";
import { Graph } from "../src/graph/model.js";

function roads(): Graph<string> {
  const graph = new Graph<string>({ directed: false });
  graph.addEdge("A", "B", 1);
  graph.addEdge("A", "C", 3);
  graph.addEdge("B", "C", 2);
  graph.addEdge("C", "D", 1);
  return graph;
}

function pairs(tree: SpanningTree<string>): string[][] {
  return tree.edges.map((edge) => [edge.from, edge.to]);
}

describe("algorithms/spanningTree", () => {
  it("picks the cheapest edges with Kruskal, ties in graph order", () => {
    const tree = kruskal(roads());
    expect(pairs(tree)).to.deep.equal([
      ["A", "B"],
      ["C", "D"],
      ["B", "C"],
    ]);
    expect(tree.totalWeight).to.equal(4);
  });

  it("grows the same weight tree with Prim", () => {
    const tree = prim(roads(), "A");
    expect(pairs(tree)).to.deep.equal([
      ["A", "B"],
      ["B", "C"],
      ["C", "D"],
    ]);
    expect(tree.totalWeight).to.equal(4);
  });

  it("spans every component with Kruskal but only the start's with Prim", () => {
    const graph = roads();
    graph.addEdge("E", "F", 5);
    const forest = kruskal(graph);
    expect(forest.edges).to.have.length(4);
    expect(forest.totalWeight).to.equal(9);
    expect(prim(graph).totalWeight).to.equal(4);
    expect(prim(graph, "E").totalWeight).to.equal(5);
  });

  it("ignores direction on directed input", () => {
    const graph = new Graph<string>();
    graph.addEdge("a", "b", 1);
    graph.addEdge("c", "b", 2);
    expect(pairs(prim(graph, "a"))).to.deep.equal([
      ["a", "b"],
      ["c", "b"],
    ]);
    expect(kruskal(graph).totalWeight).to.equal(3);
  });

  it("returns an empty tree for empty graphs and unknown starts", () => {
    expect(prim(new Graph<string>())).to.deep.equal({ edges: [], totalWeight: 0 });
    expect(prim(roads(), "missing")).to.deep.equal({ edges: [], totalWeight: 0 });
    expect(kruskal(new Graph<string>())).to.deep.equal({ edges: [], totalWeight: 0 });
  });
});
