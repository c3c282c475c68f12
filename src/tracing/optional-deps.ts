/**
 * optional-deps.ts - require() loaders for the tracing SDK packages
 *
 * The SDK and the OTLP exporter are optional peers of valkey-vector-engine.
 * Each loader returns null when its package is not installed; any other load
 * failure propagates. Tests mock this module to simulate either case.
 */

function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

/** NodeTracerProvider, SimpleSpanProcessor and ConsoleSpanExporter */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  try {
    return require("@opentelemetry/sdk-trace-node");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/sdk-trace-node")) return null;
    throw error;
  }
}

/** OTLPTraceExporter, used when OTEL_EXPORTER_TYPE=otlp */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  try {
    return require("@opentelemetry/exporter-trace-otlp-proto");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/exporter-trace-otlp-proto")) return null;
    throw error;
  }
}
