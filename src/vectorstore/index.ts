/**
 * vectorstore/index.ts - Public API for the vector engine module
 *
 * Re-exports everything callers need. Import from here, never from the
 * individual files.
 *
 * Usage:
 *   import {
 *     ValkeyBackend,
 *     VoyageEmbedding,
 *     type VectorEngine,
 *     type DataPoint,
 *   } from "./vectorstore";
 */

// Interfaces and types
export type {
  VectorEngine,
  EmbeddingEngine,
  EngineLogger,
  DataPoint,
  DataPointId,
  DataPointMetadata,
  StorageDocument,
  ScoredResult,
  RetrievedPayload,
  SearchRequest,
  BatchSearchOptions,
  DeleteResult,
} from "./types";

// Errors
export {
  VectorEngineInitializationError,
  CollectionNotFoundError,
  MissingQueryParameterError,
  ProtocolError,
} from "./errors";

// Implementations
export {
  ValkeyBackend,
  DEFAULT_VALKEY_URL,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_SCORE_THRESHOLD,
} from "./valkey-backend";
export type { ValkeyBackendOptions } from "./valkey-backend";
export { VoyageEmbedding } from "./embeddings";
export type { VoyageEmbeddingOptions } from "./embeddings";
export { ConnectionManager, parseConnectionUrl } from "./connection";

// Naming helpers
export { indexName, keyPrefix, documentKey } from "./schema";

// Provider registry
export {
  VectorEngineRegistry,
  createDefaultRegistry,
  createVectorEngine,
  valkeyEngineFactory,
} from "./registry";
export type {
  VectorEngineFactory,
  EngineDependencies,
  CreateVectorEngineOptions,
} from "./registry";
