/**
 * index.ts - Package entry point for valkey-vector-engine
 *
 * Loads tracing first (it registers the global TracerProvider when
 * OTEL_TRACING_ENABLED=true), then re-exports the vector engine API and
 * configuration loader.
 *
 * Usage:
 *   import { createVectorEngine, loadConfig } from "valkey-vector-engine";
 *
 *   const engine = createVectorEngine(loadConfig());
 *   await engine.createCollection("docs");
 */

// Initialize OpenTelemetry before any instrumented code runs
import "./tracing";

export * from "./vectorstore";
export { loadConfig, EnvConfigSchema, DEFAULT_VECTOR_DB_URL } from "./config";
export type { EngineConfig } from "./config";
export { getTracer } from "./tracing";
