import { z } from "zod";

import { GraphInputError, type GraphInputViolation } from "./errors.js";
import { Graph } from "./model.js";
import type { NodeKey } from "./types.js";

const NodeKeySchema = z.union([z.string().min(1), z.number().int()]);

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const EdgeDescriptorSchema = z
  .object({
    from: NodeKeySchema,
    to: NodeKeySchema,
    weight: z.number().finite().optional(),
    attributes: z.record(AttributeValueSchema).optional(),
  })
  .strict();

/** JSON shape accepted by {@link parseGraphDescriptor} and the CLI. */
export const GraphDescriptorSchema = z
  .object({
    name: z.string().min(1).optional(),
    directed: z.boolean().default(true),
    nodes: z.array(NodeKeySchema).default([]),
    edges: z.array(EdgeDescriptorSchema).default([]),
  })
  .strict();

export type GraphDescriptor = z.infer<typeof GraphDescriptorSchema>;
export type GraphDescriptorInput = z.input<typeof GraphDescriptorSchema>;

/**
 * Validates an untrusted value and builds the graph it describes. Declared
 * nodes are inserted first, in order, so isolated nodes survive and the
 * traversal tie-breaks follow the descriptor.
 */
export function parseGraphDescriptor(input: unknown): Graph<NodeKey> {
  const parsed = GraphDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    const violations: GraphInputViolation[] = parsed.error.issues.map((issue) => ({
      message: issue.message,
      path: `/${issue.path.join("/")}`,
    }));
    throw new GraphInputError(violations, "graph_descriptor_invalid");
  }
  return buildGraph(parsed.data);
}

export function buildGraph(descriptor: GraphDescriptor): Graph<NodeKey> {
  const graph = new Graph<NodeKey>({
    directed: descriptor.directed,
    ...(descriptor.name !== undefined ? { name: descriptor.name } : {}),
  });
  for (const node of descriptor.nodes) {
    graph.addNode(node);
  }
  for (const edge of descriptor.edges) {
    graph.addEdge(edge.from, edge.to, edge.weight ?? 1, edge.attributes ?? {});
  }
  return graph;
}

/** Inverse of {@link buildGraph}; every node is listed so isolated ones round-trip. */
export function describeGraph<N extends NodeKey>(graph: Graph<N>): GraphDescriptor {
  return {
    name: graph.name,
    directed: graph.directed,
    nodes: graph.nodes(),
    edges: graph.edges().map((edge) => ({
      from: edge.from,
      to: edge.to,
      weight: edge.weight,
      ...(Object.keys(edge.attributes).length > 0 ? { attributes: { ...edge.attributes } } : {}),
    })),
  };
}
