import { isMazeParseError, type MazeParseError } from "./errors";
import { parseMaze, type ParsedMaze } from "./maze";
import { findShortestPath, type Path } from "./path";

export type SolveOutcome =
  | { kind: "Solved"; elapsedMs: number; maze: ParsedMaze; path: Path }
  | { kind: "NoPathFound"; elapsedMs: number; maze: ParsedMaze }
  | { kind: "ParseError"; elapsedMs: number; error: MazeParseError };

export type SolveOptions = { now?: () => number };

/**
 * Parse and search one maze. The clock runs from just before parsing to just
 * after the search (or the parse failure); rendering is not timed.
 */
export function solveMaze(text: string, { now = () => performance.now() }: SolveOptions = {}): SolveOutcome {
  const t0 = now();
  const elapsed = () => Math.max(0, now() - t0);

  let maze: ParsedMaze;
  try {
    maze = parseMaze(text);
  } catch (err) {
    if (isMazeParseError(err)) return { kind: "ParseError", elapsedMs: elapsed(), error: err };
    throw err;
  }
  const path = findShortestPath(maze);
  const elapsedMs = elapsed();
  return path ? { kind: "Solved", elapsedMs, maze, path } : { kind: "NoPathFound", elapsedMs, maze };
}
