import { Registry, collectDefaultMetrics, Counter, Histogram } from "prom-client";

export function createMetrics({ defaults = true }: { defaults?: boolean } = {}) {
  const registry = new Registry();
  if (defaults) collectDefaultMetrics({ register: registry });
  const solves = new Counter({ name: "maze_solves_total", help: "Mazes processed by outcome", labelNames: ["outcome"] as const, registers: [registry] });
  const duration = new Histogram({ name: "maze_solve_duration_ms", help: "Parse + search time", buckets: [0.1, 0.5, 1, 2, 4, 8, 16, 32, 64, 128], registers: [registry] });
  const cells = new Histogram({ name: "maze_cells", help: "Grid size of parsed mazes", buckets: [16, 64, 256, 1024, 4096, 16384, 65536], registers: [registry] });
  return { registry, solves, duration, cells };
}
export type Metrics = ReturnType<typeof createMetrics>;
