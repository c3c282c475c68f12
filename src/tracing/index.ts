/**
 * tracing/index.ts - OpenTelemetry initialization for the vector engine
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so every command the engine sends to Valkey
 * shows up as a span: which command ran, against which index, how long it
 * took, and whether it failed.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API returns a "no-op" tracer that does nothing.
 *
 * Optional SDK packages:
 * @opentelemetry/sdk-trace-node and @opentelemetry/exporter-trace-otlp-proto
 * are optional peer dependencies loaded via dynamic require(). When absent,
 * initialization is skipped and the OTel API returns no-op implementations.
 *
 * Exporter options:
 * - console (default): prints spans to stdout
 * - otlp: sends spans via OTLP/protobuf to a collector
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "valkey-vector-engine";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * Exporter type: "console" for development, "otlp" for collectors.
 * "otlp" also needs OTEL_EXPORTER_OTLP_ENDPOINT.
 */
const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Create the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * Only called when @opentelemetry/sdk-trace-node is available. Throws with
 * install instructions when the requested exporter's package is missing.
 */
function createSpanExporter(
  sdk: typeof import("@opentelemetry/sdk-trace-node")
): SpanExporter {
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
    // Strip trailing slashes to avoid a double slash in the URL
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

  console.log("[OTel] Using console exporter");
  return new sdk.ConsoleSpanExporter();
}

/**
 * Register a global TracerProvider when tracing is enabled and the SDK is
 * installed. Spans are exported one by one (SimpleSpanProcessor), which suits
 * short-lived processes and tests.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.log("[OTel] Initializing OpenTelemetry tracing..."); // eslint-disable-line no-console

    const exporter = createSpanExporter(sdkTraceNode);
    const provider = new sdkTraceNode.NodeTracerProvider();
    provider.addSpanProcessor(new sdkTraceNode.SimpleSpanProcessor(exporter));
    provider.register();

    console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`); // eslint-disable-line no-console

    // Flush pending spans before the process exits
    const shutdown = async () => {
      try {
        await provider.shutdown();
        console.log("[OTel] Tracing shut down"); // eslint-disable-line no-console
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
 * Returns the tracer from whatever TracerProvider is registered globally,
 * or a no-op tracer when tracing is disabled.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

export { isTracingEnabled };
