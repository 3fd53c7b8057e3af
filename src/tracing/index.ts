/**
 * tracing/index.ts - OpenTelemetry initialization for semantic-route-index
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so every route index operation (add, query,
 * sync, config reads) shows up as a span with its timing and outcome.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API hands out a no-op tracer.
 *
 * Optional SDK:
 * @opentelemetry/sdk-trace-node and @opentelemetry/exporter-trace-otlp-proto
 * are optional dependencies loaded through optional-deps.ts. When absent,
 * initialization is skipped and spans are no-ops.
 *
 * Exporter options:
 * - console (default): prints spans to stdout
 * - otlp: sends spans over HTTP/protobuf to OTEL_EXPORTER_OTLP_ENDPOINT
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "semantic-route-index";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * Throws with an install hint when the selected exporter's package is missing.
 */
function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Strip trailing slashes so the path join has exactly one slash
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.log(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  console.log("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Register a global NodeTracerProvider when tracing is enabled and the SDK is
 * installed. Spans are exported one by one (SimpleSpanProcessor) because the
 * CLI is short-lived.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op."
    );
  } else {
    console.log("[OTel] Initializing OpenTelemetry tracing...");

    const provider = new sdkTraceNode.NodeTracerProvider();
    provider.addSpanProcessor(
      new sdkTraceNode.SimpleSpanProcessor(createSpanExporter())
    );
    provider.register();

    console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`);

    // Flush spans still in flight before the process exits
    const shutdown = async () => {
      try {
        await provider.shutdown();
        console.log("[OTel] Tracing shut down gracefully");
      } catch (error) {
        console.error("[OTel] Error shutting down tracing:", error);
      }
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  }
}

/**
 * Get a tracer for creating spans.
 *
 * Returns the tracer of the globally registered provider, or the API's no-op
 * tracer when tracing is disabled.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}
