import { bfs, dfsRecursive } from "../algorithms/traversal.js";
import { findAllPaths, findPath, shortestPath } from "../algorithms/paths.js";
import { GraphInputError, type GraphInputViolation } from "../graph/errors.js";
import { Graph } from "../graph/model.js";

/** Cell key, `"row,col"`. */
export type Cell = string;

export type MazeStrategy = "bfs" | "dfs";

export interface Maze {
  readonly rows: readonly string[];
  /** Open cells linked to their open orthogonal neighbours (right, down, left, up). */
  readonly graph: Graph<Cell>;
  readonly start: Cell;
  readonly end: Cell;
}

export interface MazeSolution {
  /** `null` when the end cannot be reached. */
  readonly path: Cell[] | null;
  /** Cells taken off the frontier before the search stopped. */
  readonly explored: number;
}

const WALL = "#";
const OPEN_CELLS = new Set([".", "S", "E"]);
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
];

export function cellKey(row: number, col: number): Cell {
  return `${row},${col}`;
}

/**
 * Reads a grid of `#` walls, `.` floor, one `S` start and one `E` end. Each
 * open cell gets arcs to its open neighbours in the order right, down, left,
 * up, which is the tie-break both solvers follow.
 */
export function parseMaze(rows: readonly string[]): Maze {
  const violations: GraphInputViolation[] = [];
  const width = rows[0]?.length ?? 0;
  if (rows.length === 0 || width === 0) {
    violations.push({ path: "/rows", message: "maze must have at least one non-empty row" });
  }

  const starts: Cell[] = [];
  const ends: Cell[] = [];
  rows.forEach((line, row) => {
    if (line.length !== width) {
      violations.push({ path: `/rows/${row}`, message: `expected ${width} cells, got ${line.length}` });
    }
    Array.from(line).forEach((symbol, col) => {
      if (symbol === "S") {
        starts.push(cellKey(row, col));
      } else if (symbol === "E") {
        ends.push(cellKey(row, col));
      } else if (symbol !== WALL && !OPEN_CELLS.has(symbol)) {
        violations.push({ path: `/rows/${row}/${col}`, message: `unknown cell '${symbol}'` });
      }
    });
  });
  if (starts.length !== 1) {
    violations.push({ path: "/start", message: `expected exactly one 'S', found ${starts.length}` });
  }
  if (ends.length !== 1) {
    violations.push({ path: "/end", message: `expected exactly one 'E', found ${ends.length}` });
  }

  const [start] = starts;
  const [end] = ends;
  if (violations.length > 0 || start === undefined || end === undefined) {
    throw new GraphInputError(violations, "maze_grid_invalid");
  }

  const isOpen = (row: number, col: number): boolean => OPEN_CELLS.has(rows[row]?.[col] ?? WALL);
  const graph = new Graph<Cell>({ name: "maze" });
  rows.forEach((line, row) => {
    for (let col = 0; col < line.length; col += 1) {
      if (isOpen(row, col)) {
        graph.addNode(cellKey(row, col));
      }
    }
  });
  for (const cell of graph.nodes()) {
    const [row, col] = parseCell(cell);
    for (const [dr, dc] of DIRECTIONS) {
      if (isOpen(row + dr, col + dc)) {
        graph.addEdge(cell, cellKey(row + dr, col + dc));
      }
    }
  }

  return { rows: [...rows], graph, start, end };
}

/**
 * `bfs` returns a shortest path; `dfs` returns the first path depth-first
 * search meets, which can be longer.
 */
export function solveMaze(maze: Maze, strategy: MazeStrategy = "bfs"): MazeSolution {
  const order = strategy === "bfs" ? bfs(maze.graph, maze.start) : dfsRecursive(maze.graph, maze.start);
  const reachedAt = order.indexOf(maze.end);
  if (reachedAt < 0) {
    return { path: null, explored: order.length };
  }
  const path =
    strategy === "bfs" ? shortestPath(maze.graph, maze.start, maze.end) : findPath(maze.graph, maze.start, maze.end);
  return { path, explored: reachedAt + 1 };
}

/** Every simple path from start to end, optionally capped at `maxCells` cells. */
export function mazePaths(maze: Maze, maxCells?: number): Cell[][] {
  return findAllPaths(maze.graph, maze.start, maze.end, maxCells === undefined ? {} : { maxEdges: maxCells - 1 });
}

/** Copy of the grid with the cells between start and end marked `*`. */
export function renderPath(maze: Maze, path: readonly Cell[]): string[] {
  const grid = maze.rows.map((line) => Array.from(line));
  for (const cell of path.slice(1, -1)) {
    const [row, col] = parseCell(cell);
    const line = grid[row];
    if (line && col < line.length) {
      line[col] = "*";
    }
  }
  return grid.map((line) => line.join(""));
}

function parseCell(cell: Cell): [number, number] {
  const [row, col] = cell.split(",").map(Number);
  return [row ?? 0, col ?? 0];
}
