import { cellAt, cellIndex, isTraversable, type Coord, type ParsedMaze } from "./maze";

export type Path = Coord[];

/** Neighbour order is fixed so ties between equal-length paths resolve the same way every run. */
const DIRS = [
  { dr: -1, dc: 0 }, // up
  { dr: 1, dc: 0 },  // down
  { dr: 0, dc: -1 }, // left
  { dr: 0, dc: 1 }   // right
] as const;

/** BFS from start to end; null when the end is unreachable. */
export function findShortestPath({ grid, start, end }: ParsedMaze): Path | null {
  const total = grid.rows * grid.cols;
  // -1 = not yet discovered; start points at itself
  const prev = new Int32Array(total).fill(-1);
  const queue = new Int32Array(total);
  let head = 0, tail = 0;

  const s = cellIndex(grid, start);
  const e = cellIndex(grid, end);
  prev[s] = s;
  queue[tail++] = s;

  let reached = false;
  while (head < tail) {
    const cur = queue[head++];
    if (cur === e) { reached = true; break; }
    const row = Math.floor(cur / grid.cols), col = cur % grid.cols;
    for (const d of DIRS) {
      const next = { row: row + d.dr, col: col + d.dc };
      if (!isTraversable(cellAt(grid, next))) continue;
      const ni = cellIndex(grid, next);
      if (prev[ni] !== -1) continue;
      prev[ni] = cur;
      queue[tail++] = ni;
    }
  }
  if (!reached) return null;

  const path: Path = [];
  for (let at = e; ; at = prev[at]) {
    path.push({ row: Math.floor(at / grid.cols), col: at % grid.cols });
    if (at === s) break;
  }
  return path.reverse();
}

/** Edge count of a path. */
export function pathLength(path: Path): number {
  return Math.max(0, path.length - 1);
}
