#!/usr/bin/env node
import process from "node:process";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { connectedComponents } from "./algorithms/components.js";
import { detectCycle, listCycles, shortestCycle } from "./algorithms/cycles.js";
import { costFromAttribute, dijkstra, shortestWeightedPath, type DijkstraOptions } from "./algorithms/dijkstra.js";
import type { AlgorithmObserver, ObservableOptions } from "./algorithms/observer.js";
import { shortestPath } from "./algorithms/paths.js";
import { kruskal, prim, type SpanningTree } from "./algorithms/spanningTree.js";
import { stronglyConnectedComponents } from "./algorithms/tarjan.js";
import { topologicalSort, topologicalSortDfs } from "./algorithms/topological.js";
import { bfs, dfs } from "./algorithms/traversal.js";
import { loadSettings, type Settings } from "./config/settings.js";
import { parseGraphDescriptor } from "./graph/descriptor.js";
import { CliUsageError, ERROR_CODES, GraphError, GraphInputError } from "./graph/errors.js";
import type { Graph } from "./graph/model.js";
import type { NodeKey } from "./graph/types.js";
import { StructuredLogger } from "./logger.js";
import { narratingObserver } from "./narration.js";

type OutputFormat = "text" | "json";

interface CliAnalysis {
  readonly name: string;
  readonly args: string[];
}

interface CliOptions {
  readonly file: string;
  readonly format: OutputFormat;
  readonly analyses: CliAnalysis[];
  readonly narrate: boolean;
  readonly weightKey?: string;
}

interface AnalysisContext {
  readonly graph: Graph<NodeKey>;
  readonly cycleLimit: number;
  readonly observer?: AlgorithmObserver<NodeKey>;
  readonly weightKey?: string;
}

/** `result` goes to the JSON report, `lines` to the text one. */
interface AnalysisReport {
  readonly result: unknown;
  readonly lines: string[];
}

interface AnalysisDefinition {
  readonly usage: string;
  run(context: AnalysisContext, args: string[]): AnalysisReport;
}

/** Dependencies `main` reaches for; tests replace them. */
export interface CliIo {
  readonly settings?: Settings;
  readonly logger?: StructuredLogger;
  readonly print?: (line: string) => void;
}

const NodeArg = z.string().min(1);

/** `[head]` or `[head, tail]`; a missing tail becomes `fallback`. */
function optionalTrailing<H, T>(
  head: z.ZodType<H, z.ZodTypeDef, unknown>,
  tail: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
) {
  return z.union([
    z.tuple([head]).transform(([first]): [H, T] => [first, fallback]),
    z.tuple([head, tail]).transform(([first, second]): [H, T] => [first, second]),
  ]);
}

/** No argument (then `fallback`) or exactly one. */
function optionalOnly<T>(value: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T) {
  return z.union([z.tuple([]).transform((): T => fallback), z.tuple([value]).transform(([only]): T => only)]);
}

/** Pairs an argument schema with the handler that consumes the parsed tuple. */
function defineAnalysis<A>(
  usage: string,
  schema: z.ZodType<A, z.ZodTypeDef, unknown>,
  run: (context: AnalysisContext, args: A) => AnalysisReport,
): AnalysisDefinition {
  return {
    usage,
    run(context, args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        throw new CliUsageError(`expected arguments: ${usage}`);
      }
      return run(context, parsed.data);
    },
  };
}

const analysisHandlers: Record<string, AnalysisDefinition> = {
  summary: defineAnalysis("(none)", z.tuple([]), ({ graph }) => {
    const stats = graph.statistics();
    return {
      result: { ...stats, directed: graph.directed },
      lines: [
        `Nodes: ${stats.nodeCount}`,
        `Edges: ${stats.edgeCount}`,
        `Directed: ${graph.directed ? "yes" : "no"}`,
        `Density: ${stats.density.toFixed(3)}`,
        `Isolated: ${formatList(stats.isolated)}`,
        `Sources: ${formatList(stats.sources)}`,
        `Sinks: ${formatList(stats.sinks)}`,
      ],
    };
  }),
  bfs: defineAnalysis("<start>", z.tuple([NodeArg]), ({ graph, observer }, [start]) => {
    const order = bfs(graph, resolveNode(graph, start), withObserver(observer));
    return { result: { order }, lines: [`Order: ${formatList(order)}`] };
  }),
  dfs: defineAnalysis(
    "<start> [recursive|iterative]",
    optionalTrailing(NodeArg, z.enum(["recursive", "iterative"]), "recursive"),
    ({ graph, observer }, [start, strategy]) => {
      const order = dfs(graph, resolveNode(graph, start), { strategy, ...withObserver(observer) });
      return { result: { order }, lines: [`Order: ${formatList(order)}`] };
    },
  ),
  shortestPath: defineAnalysis("<start> <target>", z.tuple([NodeArg, NodeArg]), ({ graph, observer }, [start, target]) => {
    const path = shortestPath(graph, resolveNode(graph, start), resolveNode(graph, target), withObserver(observer));
    return {
      result: { path, hops: path ? path.length - 1 : null },
      lines: path ? [`Path: ${formatPath(path)}`, `Hops: ${path.length - 1}`] : ["Path: none"],
    };
  }),
  dijkstra: defineAnalysis(
    "<source> [target]",
    optionalTrailing<string, string | undefined>(NodeArg, NodeArg, undefined),
    (context, [source, target]) => {
      const { graph } = context;
      const options = buildDijkstraOptions(context);
      const from = resolveNode(graph, source);
      if (target === undefined) {
        const tree = dijkstra(graph, from, options);
        const distances = Object.fromEntries(
          Array.from(tree.distances, ([node, distance]) => [String(node), Number.isFinite(distance) ? distance : null]),
        );
        return {
          result: { distances, order: tree.order },
          lines: Array.from(tree.distances, ([node, distance]) =>
            `  ${String(node)}: ${Number.isFinite(distance) ? distance : "unreachable"}`,
          ),
        };
      }
      const result = shortestWeightedPath(graph, from, resolveNode(graph, target), options);
      if (result.status === "unreachable") {
        return {
          result: { status: result.status, distance: null, visitedOrder: result.visitedOrder },
          lines: ["Distance: unreachable", `Visited order: ${formatList(result.visitedOrder)}`],
        };
      }
      return {
        result,
        lines: [
          `Distance: ${result.distance}`,
          `Path: ${formatPath(result.path)}`,
          `Visited order: ${formatList(result.visitedOrder)}`,
        ],
      };
    },
  ),
  cycles: defineAnalysis("(none)", z.tuple([]), ({ graph, observer, cycleLimit }) => {
    const detection = detectCycle(graph, withObserver(observer));
    const listed = listCycles(graph, cycleLimit);
    const shortest = shortestCycle(graph);
    return {
      result: { ...detection, shortest, listed },
      lines: [
        `Has cycle: ${detection.hasCycle ? "yes" : "no"}`,
        ...(detection.cycle ? [`Cycle: ${formatPath(detection.cycle)}`] : []),
        ...(shortest ? [`Shortest: ${formatPath(shortest)}`] : []),
        `Listed: ${listed.length}`,
      ],
    };
  }),
  components: defineAnalysis(
    "[dfs|bfs|union-find]",
    optionalOnly(z.enum(["dfs", "bfs", "union-find"]), "dfs"),
    ({ graph }, method) => {
      const components = connectedComponents(graph, { method });
      const strong = graph.directed ? stronglyConnectedComponents(graph) : null;
      const lines = [`Components: ${components.length}`, ...numbered(components)];
      if (strong) {
        lines.push("Strongly connected components:", ...numbered(strong));
      }
      return { result: { components, strong }, lines };
    },
  ),
  topologicalSort: defineAnalysis(
    "[kahn|dfs]",
    optionalOnly(z.enum(["kahn", "dfs"]), "kahn"),
    ({ graph }, method) => {
      const result = method === "dfs" ? topologicalSortDfs(graph) : topologicalSort(graph);
      return {
        result,
        lines: result.ok ? [`Order: ${formatList(result.order)}`] : [`Cyclic; unresolved: ${formatList(result.remaining)}`],
      };
    },
  ),
  mst: defineAnalysis(
    "[kruskal|prim]",
    optionalOnly(z.enum(["kruskal", "prim"]), "kruskal"),
    ({ graph }, method) => {
      const tree: SpanningTree<NodeKey> = method === "prim" ? prim(graph) : kruskal(graph);
      return {
        result: {
          totalWeight: tree.totalWeight,
          edges: tree.edges.map((edge) => ({ from: edge.from, to: edge.to, weight: edge.weight })),
        },
        lines: [
          `Total weight: ${tree.totalWeight}`,
          ...tree.edges.map((edge) => `  ${String(edge.from)} - ${String(edge.to)} (${edge.weight})`),
        ],
      };
    },
  ),
};

const DEFAULT_ANALYSES: CliAnalysis[] = [{ name: "summary", args: [] }];

/**
 * Runs the requested analyses over a JSON graph descriptor and prints one
 * report. Resolves to the process exit code; failures are logged as
 * `cli_failed` rather than thrown.
 */
export async function main(argv: string[], io: CliIo = {}): Promise<number> {
  const print = io.print ?? ((line: string) => void process.stdout.write(`${line}\n`));
  if (argv.length === 0) {
    printUsage(print);
    return 1;
  }

  const settings = io.settings ?? loadSettings();
  const logger =
    io.logger ?? new StructuredLogger({ level: settings.logLevel, logFile: settings.logFile, stream: process.stderr });

  try {
    const options = parseArgs(argv);
    const graph = await loadGraph(options.file);
    logger.info("graph_loaded", {
      file: options.file,
      name: graph.name,
      directed: graph.directed,
      nodes: graph.nodeCount,
      edges: graph.edgeCount,
    });

    const tasks = options.analyses.length > 0 ? options.analyses : DEFAULT_ANALYSES;
    const reports = tasks.map((task) => {
      const handler = analysisHandlers[task.name];
      if (!handler) {
        throw new CliUsageError(`Unknown analysis '${task.name}'`, ERROR_CODES.CLI_UNKNOWN_ANALYSIS);
      }
      const scoped = logger.child({ analysis: task.name });
      const startedAt = Date.now();
      const report = handler.run(buildAnalysisContext(graph, settings, options, scoped), task.args);
      scoped.info("analysis_completed", { duration_ms: Date.now() - startedAt });
      return { name: task.name, args: task.args, report };
    });

    if (options.format === "json") {
      print(
        JSON.stringify(
          {
            file: options.file,
            graph: { name: graph.name, directed: graph.directed, nodes: graph.nodeCount, edges: graph.edgeCount },
            analyses: reports.map(({ name, args, report }) => ({ name, args, result: report.result })),
          },
          null,
          2,
        ),
      );
    } else {
      for (const { name, args, report } of reports) {
        print(`# ${[name, ...args].join(" ")}`);
        report.lines.forEach((line) => print(line));
        print("");
      }
    }
    await logger.flush();
    return 0;
  } catch (error) {
    logger.error("cli_failed", describeError(error));
    await logger.flush();
    return 1;
  }
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("First positional argument must be the path to a graph descriptor (.json)");
  }
  const analyses: CliAnalysis[] = [];
  let format: OutputFormat = "text";
  let narrate = false;
  let weightKey: string | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--analysis": {
        const name = rest[++i];
        if (!name || name.startsWith("--")) {
          throw new CliUsageError("--analysis expects a name");
        }
        const args: string[] = [];
        while (i + 1 < rest.length && !rest[i + 1].startsWith("--")) {
          args.push(rest[++i]);
        }
        analyses.push({ name, args });
        break;
      }
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--narrate":
        narrate = true;
        break;
      case "--weight-key": {
        const value = rest[++i];
        if (!value || value.startsWith("--")) {
          throw new CliUsageError("--weight-key expects an attribute name");
        }
        weightKey = value;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  return {
    file,
    format,
    analyses,
    narrate,
    ...(weightKey === undefined ? {} : { weightKey }),
  };
}

/**
 * Omits `observer` and `weightKey` when they are not in use instead of
 * forwarding `undefined`, which `exactOptionalPropertyTypes` rejects.
 */
function buildAnalysisContext(
  graph: Graph<NodeKey>,
  settings: Pick<Settings, "narrate" | "cycleLimit">,
  options: Pick<CliOptions, "narrate" | "weightKey">,
  logger: StructuredLogger,
): AnalysisContext {
  const narrate = options.narrate || settings.narrate;
  return {
    graph,
    cycleLimit: settings.cycleLimit,
    ...(narrate ? { observer: narratingObserver<NodeKey>(logger) } : {}),
    ...(options.weightKey === undefined ? {} : { weightKey: options.weightKey }),
  };
}

function buildDijkstraOptions(context: AnalysisContext): DijkstraOptions<NodeKey> {
  return {
    ...(context.weightKey === undefined ? {} : { cost: costFromAttribute<NodeKey>(context.weightKey) }),
    ...withObserver(context.observer),
  };
}

function withObserver(observer: AlgorithmObserver<NodeKey> | undefined): ObservableOptions<NodeKey> {
  return observer === undefined ? {} : { observer };
}

/**
 * Command-line arguments are strings while descriptor keys may be integers:
 * the literal wins when the graph has it, then its integer reading.
 */
function resolveNode(graph: Graph<NodeKey>, raw: string): NodeKey {
  if (graph.hasNode(raw)) {
    return raw;
  }
  if (/^-?\d+$/.test(raw) && graph.hasNode(Number(raw))) {
    return Number(raw);
  }
  throw new CliUsageError(`Unknown node '${raw}'`);
}

async function loadGraph(file: string): Promise<Graph<NodeKey>> {
  const contents = await readFile(file, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new GraphInputError(
      [{ path: "/", message: `not valid JSON (${error instanceof Error ? error.message : String(error)})` }],
      "graph_descriptor_invalid",
    );
  }
  return parseGraphDescriptor(parsed);
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof GraphError) {
    return { code: error.code, message: error.message, hint: error.hint, details: error.details };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { error: String(error) };
}

function formatList(nodes: readonly NodeKey[]): string {
  return nodes.length === 0 ? "(none)" : nodes.map(String).join(", ");
}

function formatPath(path: readonly NodeKey[]): string {
  return path.map(String).join(" -> ");
}

function numbered(groups: readonly NodeKey[][]): string[] {
  return groups.map((group, index) => `  ${index + 1}. ${formatList(group)}`);
}

function printUsage(print: (line: string) => void): void {
  print("Usage: graph-primer <graph.json> [--analysis name arg1 arg2 ...] [--format json|text] [--narrate] [--weight-key attr]");
  print("");
  print("Analyses:");
  for (const [name, definition] of Object.entries(analysisHandlers)) {
    print(`  ${name} ${definition.usage}`);
  }
  print("");
  print("Examples:");
  print("  graph-primer samples/weighted-routes.json --analysis dijkstra A D");
  print("  graph-primer samples/dependencies.json --analysis topologicalSort --format json");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  return fileURLToPath(import.meta.url) === executedFromCli;
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers to the test suite without making them part of the
 * package API.
 */
export const __testing = {
  buildAnalysisContext,
  parseArgs,
  resolveNode,
};
