import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { v4 as uuidv4 } from "uuid";
import { SpanStatusCode, trace } from "@opentelemetry/api";

import { SolveRequest, hashMaze, hashPath, type ErrorBody, type SolveResponse } from "@shared/core";
import { formatMs, pathLength, renderOutcome, solveMaze, type SolveOptions, type SolveOutcome } from "@maze/core";
import { isWritableDir, writeArtifact } from "./artifact";
import type { Config } from "./config";
import type { Metrics } from "./metrics";

export type AppDeps = {
  config: Pick<Config, "outputDir" | "maxMazeBytes" | "writeArtifacts">;
  metrics: Metrics;
  now?: SolveOptions["now"];
  log?: (line: string) => void;
};

const tracer = trace.getTracer("maze-solver");

function hasStatus(err: unknown): err is { status: number; message?: unknown } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

function toResponse(outcome: SolveOutcome, base: Omit<SolveResponse, "kind" | "elapsedMs">): SolveResponse {
  const elapsedMs = outcome.elapsedMs;
  switch (outcome.kind) {
    case "Solved": {
      const path = outcome.path.map(({ row, col }): [number, number] => [row, col]);
      return { ...base, kind: "Solved", elapsedMs, path, steps: pathLength(outcome.path), pathHash: hashPath(path) };
    }
    case "NoPathFound":
      return { ...base, kind: "NoPathFound", elapsedMs };
    case "ParseError": {
      const { kind, message, context } = outcome.error;
      return { ...base, kind: "ParseError", elapsedMs, error: { kind, message, context } };
    }
  }
}

export function createApp({ config, metrics, now, log = console.log }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.maxMazeBytes }));
  app.use(express.text({ type: "text/plain", limit: config.maxMazeBytes }));

  app.get("/metrics", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await metrics.registry.metrics();
      res.set("Content-Type", metrics.registry.contentType);
      res.end(body);
    } catch (err) {
      next(err);
    }
  });

  app.get("/healthz", (_req: Request, res: Response) => res.json({ ok: true }));
  app.get("/readyz", async (_req: Request, res: Response) => {
    const ok = !config.writeArtifacts || await isWritableDir(config.outputDir);
    res.status(ok ? 200 : 503).json(ok ? { ok } : { ok, error: `output dir not writable: ${config.outputDir}` });
  });

  app.post("/solve", async (req: Request, res: Response<SolveResponse | ErrorBody>, next: NextFunction) => {
    const parsed = SolveRequest.safeParse(typeof req.body === "string" ? { maze: req.body } : req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; ") });
      return;
    }
    const { maze, persist } = parsed.data;
    const requestId = uuidv4();

    try {
      const outcome = tracer.startActiveSpan("maze.solve", span => {
        try {
          const result = solveMaze(maze, { now });
          span.setAttributes({ "maze.outcome": result.kind, "maze.elapsed_ms": result.elapsedMs });
          if (result.kind !== "ParseError") span.setAttribute("maze.cells", result.maze.grid.rows * result.maze.grid.cols);
          return result;
        } catch (err) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
          throw err;
        } finally {
          span.end();
        }
      });

      metrics.solves.inc({ outcome: outcome.kind });
      metrics.duration.observe(outcome.elapsedMs);
      if (outcome.kind !== "ParseError") metrics.cells.observe(outcome.maze.grid.rows * outcome.maze.grid.cols);

      const output = renderOutcome(outcome, maze);
      let artifact: string | null = null;
      if (config.writeArtifacts && persist) {
        const name = `${requestId}.txt`;
        try {
          await writeArtifact(config.outputDir, name, output);
          artifact = name;
        } catch (err) {
          log(`[artifact] ${requestId} not written: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
      log(`[solve] ${requestId} ${outcome.kind} ${formatMs(outcome.elapsedMs)}ms`);
      res.json(toResponse(outcome, { requestId, mazeHash: hashMaze(maze), artifact, output }));
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, _req: Request, res: Response<ErrorBody>, _next: NextFunction) => {
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: typeof err.message === "string" ? err.message : "bad request" });
      return;
    }
    log(`[http] unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).json({ error: "internal error" });
  });

  return app;
}
