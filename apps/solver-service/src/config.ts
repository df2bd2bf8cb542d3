import { z } from "zod";

const flag = (fallback: "true" | "false") => z.enum(["true", "false"]).default(fallback).transform(v => v === "true");

const Env = z.object({
  SERVER_PORT: z.string().min(1, "must not be empty").default("8080").pipe(z.coerce.number().int().min(0).max(65535)),
  OUTPUT_DIR: z.string().min(1).default("./output"),
  MAX_MAZE_BYTES: z.string().min(1).default("1mb"), // body-parser size syntax
  WRITE_ARTIFACTS: flag("true"),
  OTEL_ENABLED: flag("false"),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().default("http://localhost:4318"),
  OTEL_SERVICE_NAME: z.string().min(1).default("maze-solver")
});

export type Config = {
  port: number;
  outputDir: string;
  maxMazeBytes: string;
  writeArtifacts: boolean;
  otel: { enabled: boolean; endpoint: string; serviceName: string };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.SERVER_PORT,
    outputDir: e.OUTPUT_DIR,
    maxMazeBytes: e.MAX_MAZE_BYTES,
    writeArtifacts: e.WRITE_ARTIFACTS,
    otel: { enabled: e.OTEL_ENABLED, endpoint: e.OTEL_EXPORTER_OTLP_ENDPOINT, serviceName: e.OTEL_SERVICE_NAME }
  };
}
