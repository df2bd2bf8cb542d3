import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { formatMs, type SolveOutcome } from "@maze/core";
import { solveToFile } from "./artifact";

const USAGE = "usage: maze-solve <maze-file> [--out <file>]";

export const EXIT_CODES: Readonly<Record<SolveOutcome["kind"], number>> = { Solved: 0, NoPathFound: 2, ParseError: 3 };

type Io = { log: (line: string) => void; error: (line: string) => void };

export async function main(argv: string[], io: Io = { log: console.log, error: console.error }): Promise<number> {
  let args: ReturnType<typeof parse>;
  try {
    args = parse(argv);
  } catch (err) {
    io.error(`${err instanceof Error ? err.message : String(err)}\n${USAGE}`);
    return 1;
  }
  const [file, ...extra] = args.positionals;
  if (!file || extra.length > 0) {
    io.error(USAGE);
    return 1;
  }
  const out = args.values.out ?? "output.txt";

  let maze: string;
  try {
    maze = await readFile(file, "utf8");
  } catch (err) {
    io.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  const { outcome, artifactError } = await solveToFile(maze, out, undefined, io.error);
  const timing = `${outcome.kind} in ${formatMs(outcome.elapsedMs)} ms`;
  if (artifactError) {
    io.log(`${timing} (artifact not written)`);
    return 1;
  }
  io.log(`${timing} -> ${out}`);
  return EXIT_CODES[outcome.kind];
}

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: { out: { type: "string", short: "o" } }, allowPositionals: true });
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    err => { console.error(err); process.exitCode = 1; }
  );
}
