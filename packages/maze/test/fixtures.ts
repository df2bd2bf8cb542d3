import { readFileSync } from "node:fs";
import path from "node:path";

/** Maze text from test/fixtures, without the file's trailing newline. */
export function fixture(name: "sample" | "walled-end" | "spiral"): string {
  return readFileSync(path.join(__dirname, "fixtures", `${name}.txt`), "utf8").replace(/\n$/, "");
}
