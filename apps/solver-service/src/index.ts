import "dotenv/config";
import { mkdir } from "node:fs/promises";
import http from "node:http";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { createMetrics } from "./metrics";
import { startTracing } from "./otel";

// --- ENV -------------------------------------------------------
const config = loadConfig();

// --- INFRA -----------------------------------------------------
const stopTracing = config.otel.enabled ? startTracing(config.otel) : async () => {};
const metrics = createMetrics();
const server = http.createServer(createApp({ config, metrics }));

// --- BOOT ------------------------------------------------------
async function boot() {
  if (config.writeArtifacts) await mkdir(config.outputDir, { recursive: true });
  server.listen(config.port, () => {
    console.log(`Maze solver http on :${config.port} (artifacts: ${config.writeArtifacts ? config.outputDir : "off"})`);
  });
}

boot().catch(err => {
  console.error("boot failed", err);
  process.exitCode = 1;
  stopTracing().catch(e => console.error("tracing shutdown failed", e));
});

process.on("SIGTERM", () => {
  server.close();
  stopTracing().catch(err => console.error("tracing shutdown failed", err));
});
