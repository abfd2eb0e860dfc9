/**
 * Stable error codes grouped by feature family. Callers branch on `code`
 * rather than on messages, which stay free to evolve.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
    INVALID_WEIGHT: "E-GRAPH-INVALID-WEIGHT",
    NEGATIVE_WEIGHT: "E-GRAPH-NEGATIVE-WEIGHT",
  },
  CLI: {
    USAGE: "E-CLI-USAGE",
    UNKNOWN_ANALYSIS: "E-CLI-UNKNOWN-ANALYSIS",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/** Flat access to every error code (e.g. `ERROR_CODES.GRAPH_NEGATIVE_WEIGHT`). */
export const ERROR_CODES: FlatErrorCatalog = {
  GRAPH_INVALID_INPUT: ERROR_CATALOG.GRAPH.INVALID_INPUT,
  GRAPH_INVALID_WEIGHT: ERROR_CATALOG.GRAPH.INVALID_WEIGHT,
  GRAPH_NEGATIVE_WEIGHT: ERROR_CATALOG.GRAPH.NEGATIVE_WEIGHT,
  CLI_USAGE: ERROR_CATALOG.CLI.USAGE,
  CLI_UNKNOWN_ANALYSIS: ERROR_CATALOG.CLI.UNKNOWN_ANALYSIS,
};

export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Single problem found while validating an input, addressed by JSON pointer. */
export interface GraphInputViolation {
  readonly message: string;
  readonly path: string;
}

/** Base error for everything raised by the library. */
export class GraphError extends Error {
  public readonly code: ErrorCode;
  public readonly hint: string;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, hint: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "GraphError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Raised for malformed values: non-finite weights, invalid descriptors or mazes. */
export class GraphInputError extends GraphError {
  public readonly violations: GraphInputViolation[];

  constructor(violations: GraphInputViolation[], hint = "fix_listed_fields") {
    super(
      ERROR_CODES.GRAPH_INVALID_INPUT,
      violations.map((violation) => `${violation.path}: ${violation.message}`).join("; "),
      hint,
      { violations },
    );
    this.name = "GraphInputError";
    this.violations = violations;
  }
}

/**
 * Raised when a shortest-path search meets an edge whose cost is negative or
 * not finite. Dijkstra's finalisation rule does not hold for such edges.
 */
export class NegativeWeightError extends GraphError {
  constructor(from: unknown, to: unknown, cost: number) {
    super(
      Number.isFinite(cost) ? ERROR_CODES.GRAPH_NEGATIVE_WEIGHT : ERROR_CODES.GRAPH_INVALID_WEIGHT,
      `edge ${String(from)} -> ${String(to)} has cost ${cost}; shortest-path search needs non-negative finite costs`,
      "use_non_negative_costs",
      { from, to, cost },
    );
    this.name = "NegativeWeightError";
  }
}

/** Raised by the CLI for malformed command lines. */
export class CliUsageError extends GraphError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.CLI_USAGE) {
    super(code, message, "run_without_arguments_for_usage");
    this.name = "CliUsageError";
  }
}
