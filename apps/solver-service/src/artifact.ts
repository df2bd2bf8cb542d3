import { constants } from "node:fs";
import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { renderOutcome, solveMaze, type SolveOptions, type SolveOutcome } from "@maze/core";

export async function writeArtifact(dir: string, name: string, text: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, name);
  await writeFile(file, text, "utf8");
  return file;
}

/** Read-only check; the directory itself is created at boot. */
export async function isWritableDir(dir: string): Promise<boolean> {
  try {
    await access(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export type SolveToFileResult = { outcome: SolveOutcome; artifactError: Error | null };

/**
 * Solve, then write the audit artifact to `outputFile`. A failed write is
 * logged and reported beside the outcome, which keeps its elapsed time.
 */
export async function solveToFile(
  labyrinth: string,
  outputFile = "output.txt",
  options?: SolveOptions,
  log: (line: string) => void = console.error
): Promise<SolveToFileResult> {
  const outcome = solveMaze(labyrinth, options);
  try {
    await writeArtifact(path.dirname(outputFile), path.basename(outputFile), renderOutcome(outcome, labyrinth));
    return { outcome, artifactError: null };
  } catch (err) {
    const artifactError = err instanceof Error ? err : new Error(String(err));
    log(`[artifact] could not write ${outputFile}: ${artifactError.message}`);
    return { outcome, artifactError };
  }
}
