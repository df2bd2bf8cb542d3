import { PATH_MARK, SYMBOLS, cellAt, type Grid } from "./maze";
import type { Path } from "./path";
import type { SolveOutcome } from "./solve";

function symbolRows(grid: Grid): string[][] {
  return Array.from({ length: grid.rows }, (_, row) =>
    grid.cells.slice(row * grid.cols, (row + 1) * grid.cols).map(kind => SYMBOLS[kind]));
}

export function gridToString(grid: Grid): string {
  return symbolRows(grid).map(r => r.join("")).join("\n");
}

/** Rows of the grid with every path cell except start and end overwritten by the path mark. */
export function renderPath(grid: Grid, path: Path): string[] {
  const rows = symbolRows(grid);
  for (const at of path) {
    const kind = cellAt(grid, at);
    if (kind === undefined || kind === "start" || kind === "end") continue;
    rows[at.row][at.col] = PATH_MARK;
  }
  return rows.map(r => r.join(""));
}

export const formatMs = (ms: number) => ms.toFixed(4);

/** Audit artifact for any outcome; `source` is the maze text exactly as received. */
export function renderOutcome(outcome: SolveOutcome, source: string): string {
  switch (outcome.kind) {
    case "Solved":
      return renderPath(outcome.maze.grid, outcome.path).join("\n");
    case "NoPathFound":
      return `No path found in maze.\n(Processing time: ${formatMs(outcome.elapsedMs)} ms)\n\n${source}`;
    case "ParseError":
      return `Error processing maze: ${outcome.error.message}\nElapsed until error: ${formatMs(outcome.elapsedMs)} ms\n\nMaze provided:\n${source}`;
  }
}
