/**
 * types.ts - Vector engine interfaces and types
 *
 * What this file does:
 * Defines the shapes the rest of the system uses to talk to the vector
 * database. Callers import from here and never touch Valkey (or any other
 * backend) directly.
 *
 * Key concepts:
 * - VectorEngine: the async capability surface (create/search/delete/prune)
 * - EmbeddingEngine: turns text into numbers (vectors) for similarity search
 * - DataPoint: a caller-supplied record to index
 * - StorageDocument: what actually lands in the store for each DataPoint
 * - ScoredResult: a document found by similarity search, with its distance
 */

/**
 * Converts text into embedding vectors.
 *
 * Different embedding models (Voyage AI, OpenAI, local models) all do the
 * same thing: text in, numbers out. The vector engine also needs to know how
 * long those vectors are, because the index schema fixes the dimensionality
 * at creation time.
 */
export interface EmbeddingEngine {
  /**
   * Converts an array of text strings into embedding vectors.
   *
   * @returns One vector per input text, in input order
   */
  embedText(texts: string[]): Promise<number[][]>;

  /** Length of every vector this engine produces */
  getVectorSize(): number;
}

/** Identifier types accepted for a DataPoint; stored as strings. */
export type DataPointId = string | number | bigint;

/**
 * Indexing hints carried on a DataPoint.
 */
export interface DataPointMetadata {
  /**
   * Names of the record fields whose text gets embedded.
   * Defaults to ["text"].
   */
  indexFields?: string[];
  /** Free-form record type label, stored with the payload */
  type?: string;
}

/**
 * A record to store in the vector database.
 *
 * Everything on the record, including id and metadata, becomes the stored
 * payload. Only the fields named in metadata.indexFields are embedded.
 */
export interface DataPoint {
  /** Unique within a collection; addresses exactly one stored document */
  id: DataPointId;
  metadata?: DataPointMetadata;
  [field: string]: unknown;
}

/**
 * The JSON document written for each DataPoint.
 *
 * Stored at `vdb:{collection}:{id}`. The payload is kept as a JSON string
 * so the search index only has to understand `id` and `vector`.
 */
export interface StorageDocument {
  id: string;
  vector: number[];
  payload_data: string;
}

/**
 * A search result returned from a similarity query.
 */
export interface ScoredResult {
  /** Document id (falls back to the storage key when the id field is missing) */
  id: string;
  /**
   * Decoded payload. When the stored payload is not a JSON object it degrades
   * to `{ _payload: value }`, and to `{ _payload_raw: text }` when it is not
   * JSON at all.
   */
  payload: Record<string, unknown>;
  /**
   * Cosine distance to the query: 0.0 = identical, 2.0 = opposite.
   * Lower scores mean more similar results. Null when the store sent none.
   */
  score: number | null;
  /** The stored vector, only when the search asked for it */
  vector?: number[];
}

/**
 * What retrieve() returns per found id: the decoded payload, or the raw
 * stored document text when the payload could not be parsed.
 */
export type RetrievedPayload = Record<string, unknown> | string;

/**
 * Options for a single similarity search.
 */
export interface SearchRequest {
  /** Natural language query, embedded before searching */
  queryText?: string | null;
  /** Pre-computed query vector; used as-is when present */
  queryVector?: number[] | null;
  /**
   * Maximum number of neighbours (default: 15). Pass null to search the whole
   * collection (the index's current document count).
   */
  limit?: number | null;
  /** Also return each result's stored vector */
  withVector?: boolean;
}

/**
 * Options for batchSearch().
 */
export interface BatchSearchOptions {
  /** Per-query neighbour limit (default: 15, null = whole collection) */
  limit?: number | null;
  withVectors?: boolean;
  /**
   * Keep only results whose distance is strictly below this value
   * (default: 0.1). Assumes the cosine-distance convention.
   */
  scoreThreshold?: number;
}

/** Result of deleteDataPoints(): how many documents the store removed. */
export interface DeleteResult {
  deleted: number;
}

/**
 * Logger used by the engine. Defaults to console.
 */
export type EngineLogger = Pick<Console, "info" | "warn" | "error">;

/**
 * The main interface for vector database operations.
 *
 * Usage pattern:
 *   1. createCollection(): create the index (idempotent)
 *   2. createDataPoints(): embed and store records
 *   3. search() / batchSearch(): find similar records
 *   4. deleteDataPoints() / prune(): clean up
 */
export interface VectorEngine {
  hasCollection(collection: string): Promise<boolean>;

  /**
   * Creates the collection's index unless it already exists.
   * The schema argument is accepted for interface compatibility and ignored;
   * the index schema is always derived from the embedding engine.
   */
  createCollection(collection: string, schema?: unknown): Promise<void>;

  /** @throws CollectionNotFoundError when the collection does not exist */
  createDataPoints(collection: string, points: DataPoint[]): Promise<void>;

  retrieve(collection: string, ids: DataPointId[]): Promise<RetrievedPayload[]>;

  /** @throws MissingQueryParameterError when neither text nor vector is given */
  search(collection: string, request: SearchRequest): Promise<ScoredResult[]>;

  batchSearch(
    collection: string,
    queryTexts: string[],
    options?: BatchSearchOptions
  ): Promise<ScoredResult[][]>;

  deleteDataPoints(collection: string, ids: DataPointId[]): Promise<DeleteResult>;

  /** Drops every index in the store along with its documents */
  prune(): Promise<void>;

  embedData(texts: string[]): Promise<number[][]>;

  close(): Promise<void>;
}
