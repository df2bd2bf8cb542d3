import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import type { Config } from "./config";

/** Starts the Node SDK; the returned function flushes and stops it. */
export function startTracing({ endpoint, serviceName }: Config["otel"]): () => Promise<void> {
  const exporter = new OTLPTraceExporter({ url: `${endpoint}/v1/traces` });
  const sdk = new NodeSDK({ traceExporter: exporter, serviceName });
  sdk.start();
  return () => sdk.shutdown();
}
