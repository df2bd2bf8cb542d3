import { MazeParseError } from "./errors";

/** Rectangular character grid: walls, free cells, one start, one end. */
export type CellKind = "wall" | "free" | "start" | "end";
export type Coord = { row: number; col: number };
export type Grid = { readonly rows: number; readonly cols: number; readonly cells: readonly CellKind[] };
export type ParsedMaze = { grid: Grid; start: Coord; end: Coord };

export const SYMBOLS: Readonly<Record<CellKind, string>> = { wall: "#", free: " ", start: "S", end: "E" };
export const PATH_MARK = "·";

const KINDS: readonly CellKind[] = ["wall", "free", "start", "end"];
const KIND_OF = new Map<string, CellKind>(KINDS.map(kind => [SYMBOLS[kind], kind] as const));

export const cellIndex = (grid: Grid, at: Coord) => at.row * grid.cols + at.col;
export const inBounds = (grid: Grid, at: Coord) => at.row >= 0 && at.col >= 0 && at.row < grid.rows && at.col < grid.cols;
export const cellAt = (grid: Grid, at: Coord): CellKind | undefined => inBounds(grid, at) ? grid.cells[cellIndex(grid, at)] : undefined;
/** Start and end count as free space. */
export const isTraversable = (kind: CellKind | undefined) => kind !== undefined && kind !== "wall";

export function parseMaze(text: string): ParsedMaze {
  if (text.trim() === "") {
    throw new MazeParseError("EmptyInput", {}, "Maze is empty or contains only whitespace.");
  }
  const lines = text.replace(/^(?:\r?\n)+|(?:\r?\n)+$/g, "").split(/\r?\n/).map(line => Array.from(line));
  const rows = lines.length;
  const cols = lines[0]?.length ?? 0;

  const cells: CellKind[] = [];
  const starts: Coord[] = [];
  const ends: Coord[] = [];
  lines.forEach((line, row) => {
    if (line.length !== cols) {
      throw new MazeParseError("MalformedGrid", { row, expected: cols, actual: line.length },
        `Row ${row + 1} has inconsistent length. Expected: ${cols}, got: ${line.length}.`);
    }
    line.forEach((char, col) => {
      const kind = KIND_OF.get(char);
      if (!kind) {
        throw new MazeParseError("InvalidCharacter", { row, col, char },
          `Invalid character '${char}' at (${row},${col}). Use only 'S', 'E', '#', ' '.`);
      }
      if (kind === "start") starts.push({ row, col });
      if (kind === "end") ends.push({ row, col });
      cells.push(kind);
    });
  });

  const [start] = starts;
  const [end] = ends;
  if (!start || starts.length !== 1) {
    throw new MazeParseError("MissingStart", { count: starts.length },
      starts.length === 0 ? "Start point 'S' not found in maze." : `Start point 'S' found ${starts.length} times; expected exactly one.`);
  }
  if (!end || ends.length !== 1) {
    throw new MazeParseError("MissingEnd", { count: ends.length },
      ends.length === 0 ? "End point 'E' not found in maze." : `End point 'E' found ${ends.length} times; expected exactly one.`);
  }

  const grid: Grid = Object.freeze({ rows, cols, cells: Object.freeze(cells) });
  return { grid, start, end };
}
