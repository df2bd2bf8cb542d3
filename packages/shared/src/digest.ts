import crypto from "node:crypto";

/** sha256 of the maze exactly as received, for pairing an artifact with its input. */
export function hashMaze(text: string) {
  return crypto.createHash("sha256").update(text).digest("hex");
}

/** sha256 over `row,col` cells joined by `|`. */
export function hashPath(cells: ReadonlyArray<readonly [number, number]>) {
  return crypto.createHash("sha256").update(cells.map(([r, c]) => `${r},${c}`).join("|")).digest("hex");
}
