import { describe, it } from "mocha";
import { expect } from "chai";

import { buildGraph, describeGraph, parseGraphDescriptor } from "../src/graph/descriptor.js";
import { GraphInputError } from "../src/graph/errors.js";

describe("graph/descriptor", () => {
  it("builds a directed graph by default with declared nodes first", () => {
    const graph = parseGraphDescriptor({
      name: "sample",
      nodes: ["z"],
      edges: [{ from: "a", to: "b", weight: 2, attributes: { label: "ab" } }],
    });
    expect(graph.name).to.equal("sample");
    expect(graph.directed).to.equal(true);
    expect(graph.nodes()).to.deep.equal(["z", "a", "b"]);
    expect(graph.getEdge("a", "b")?.attributes).to.deep.equal({ label: "ab" });
  });

  it("accepts integer keys and defaults weights to one", () => {
    const graph = parseGraphDescriptor({ directed: false, edges: [{ from: 0, to: 1 }] });
    expect(graph.directed).to.equal(false);
    expect(graph.getEdge(1, 0)?.weight).to.equal(1);
  });

  it("collects every violation with a JSON pointer path", () => {
    try {
      parseGraphDescriptor({ directed: "yes", edges: [{ from: "a" }], extra: true });
      expect.fail("expected a GraphInputError");
    } catch (error) {
      expect(error).to.be.instanceOf(GraphInputError);
      if (error instanceof GraphInputError) {
        const paths = error.violations.map((violation) => violation.path);
        expect(paths).to.include("/directed");
        expect(paths).to.include("/edges/0/to");
        expect(paths).to.include("/");
        expect(error.hint).to.equal("graph_descriptor_invalid");
      }
    }
  });

  it("rejects non-finite weights and empty string keys", () => {
    expect(() => parseGraphDescriptor({ edges: [{ from: "", to: "b" }] })).to.throw(GraphInputError);
    expect(() => parseGraphDescriptor({ nodes: [1.5] })).to.throw(GraphInputError);
  });

  it("describes a graph so that rebuilding it yields the same structure", () => {
    const original = parseGraphDescriptor({
      name: "roundtrip",
      directed: false,
      nodes: ["solo"],
      edges: [
        { from: "a", to: "b", weight: 3 },
        { from: "b", to: "c", attributes: { kind: "road" } },
      ],
    });
    const descriptor = describeGraph(original);
    expect(descriptor).to.deep.equal({
      name: "roundtrip",
      directed: false,
      nodes: ["solo", "a", "b", "c"],
      edges: [
        { from: "a", to: "b", weight: 3 },
        { from: "b", to: "c", weight: 1, attributes: { kind: "road" } },
      ],
    });
    const rebuilt = buildGraph(descriptor);
    expect(rebuilt.nodes()).to.deep.equal(original.nodes());
    expect(rebuilt.edgeCount).to.equal(original.edgeCount);
  });
});
