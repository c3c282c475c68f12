/**
 * valkey-backend.ts - Valkey implementation of the VectorEngine interface
 *
 * What this file does:
 * Stores DataPoints as JSON documents in Valkey and searches them with the
 * search module's HNSW vector index. Everything else codes against the
 * VectorEngine interface in types.ts.
 *
 * How it works:
 * 1. createCollection() creates an index over `vdb:{collection}:*` documents
 * 2. createDataPoints() embeds every record in one batch, then writes each
 *    document with JSON.SET (all writes in flight together)
 * 3. search() embeds the query (unless a vector is given), runs a KNN
 *    FT.SEARCH, and decodes the hits into ScoredResults, closest first
 * 4. batchSearch() embeds all queries at once and runs one search per vector
 * 5. deleteDataPoints() / prune() remove documents and indexes
 *
 * Existence checks:
 * Read paths treat a missing collection as empty (search returns []).
 * Write paths treat it as an error (CollectionNotFoundError). A lookup that
 * fails for any other reason is never mistaken for "missing": it is logged
 * and rethrown.
 */

import type { CommandArgument, StoreConnection } from "../utils/valkey-client";
import { ConnectionManager, type ConnectionManagerOptions } from "./connection";
import {
  decodeScoredResults,
  decodeStoredDocument,
  getEmbeddableText,
  sortByScore,
  toFloat32Buffer,
  toStorageDocument,
} from "./codec";
import {
  CollectionNotFoundError,
  MissingQueryParameterError,
  ProtocolError,
  VectorEngineInitializationError,
} from "./errors";
import {
  isOkReply,
  normalizeReply,
  parseIndexList,
  parseIntegerReply,
  parseScanReply,
  toSearchResponse,
} from "./protocol";
import {
  CollectionLock,
  collectionFromIndex,
  createIndex,
  documentKey,
  indexName,
  keyPrefix,
  lookupCollection,
  type CollectionLookup,
} from "./schema";
import type {
  BatchSearchOptions,
  DataPoint,
  DataPointId,
  DeleteResult,
  EmbeddingEngine,
  EngineLogger,
  RetrievedPayload,
  ScoredResult,
  SearchRequest,
  VectorEngine,
} from "./types";

/**
 * Default Valkey URL. Override with VECTOR_DB_URL or the url option.
 */
export const DEFAULT_VALKEY_URL = "valkey://localhost:6379";

export const DEFAULT_SEARCH_LIMIT = 15;
export const DEFAULT_SCORE_THRESHOLD = 0.1;

/** Name of the KNN query's vector parameter. */
const QUERY_VECTOR_PARAM = "query_vector";

/** Keys requested per SCAN page when pruning documents. */
const SCAN_PAGE_SIZE = 500;

export type ValkeyBackendOptions = Partial<ConnectionManagerOptions>;

/**
 * Builds the FT.SEARCH arguments for a KNN query.
 *
 * Example for ("docs", v, 10, false):
 *   index:docs "*=>[KNN 10 @vector $query_vector]"
 *     PARAMS 2 query_vector <float32 bytes>
 *     RETURN 9 $.id AS id $.payload_data AS payload_data __vector_score AS score
 *     LIMIT 0 10 DIALECT 2
 */
export function buildKnnSearchArgs(
  collection: string,
  vector: number[],
  limit: number,
  withVector: boolean
): CommandArgument[] {
  const returnFields = [
    "$.id", "AS", "id",
    "$.payload_data", "AS", "payload_data",
    "__vector_score", "AS", "score",
  ];
  if (withVector) {
    returnFields.push("$.vector", "AS", "vector");
  }

  return [
    indexName(collection),
    `*=>[KNN ${limit} @vector $${QUERY_VECTOR_PARAM}]`,
    "PARAMS", 2, QUERY_VECTOR_PARAM, toFloat32Buffer(vector),
    "RETURN", returnFields.length, ...returnFields,
    "LIMIT", 0, limit,
    "DIALECT", 2,
  ];
}

/**
 * Escapes glob metacharacters so a key prefix matches literally in SCAN.
 */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&");
}

/**
 * Valkey implementation of the VectorEngine interface.
 *
 * Usage:
 *   const embedder = new VoyageEmbedding();
 *   const engine = new ValkeyBackend(embedder, { url: "valkey://localhost:6379" });
 *
 *   await engine.createCollection("docs");
 *   await engine.createDataPoints("docs", [{ id: "a", text: "Hello Valkey" }]);
 *   const results = await engine.search("docs", { queryText: "Hello" });
 */
export class ValkeyBackend implements VectorEngine {
  readonly name = "Valkey";

  private readonly embeddingEngine: EmbeddingEngine;
  private readonly connections: ConnectionManager;
  private readonly logger: EngineLogger;
  private readonly collectionLock = new CollectionLock();

  /**
   * @param embeddingEngine - Converts text to vectors and reports their size
   * @param options - Connection settings; url defaults to VECTOR_DB_URL env
   *   var or valkey://localhost:6379 (an empty value counts as unset)
   * @throws VectorEngineInitializationError when no embedding engine is given
   *   or the url cannot be parsed
   */
  constructor(
    embeddingEngine: EmbeddingEngine | null | undefined,
    options?: ValkeyBackendOptions
  ) {
    if (!embeddingEngine) {
      throw new VectorEngineInitializationError(
        "Embedding engine is required. Provide an embedding engine to the Valkey backend."
      );
    }

    this.embeddingEngine = embeddingEngine;
    this.logger = options?.logger ?? console;
    this.connections = new ConnectionManager({
      ...options,
      url: options?.url || process.env.VECTOR_DB_URL || DEFAULT_VALKEY_URL,
      logger: this.logger,
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Returns the shared connection, opening it on first use. */
  getConnection(): Promise<StoreConnection> {
    return this.connections.getConnection();
  }

  /** Closes the connection; close-time errors are swallowed. */
  close(): Promise<void> {
    return this.connections.close();
  }

  /**
   * Round-trips a PING.
   *
   * @returns true when the server answers PONG
   */
  async ping(): Promise<boolean> {
    const connection = await this.getConnection();
    return normalizeReply(await connection.sendCommand("PING")) === "PONG";
  }

  embedData(texts: string[]): Promise<number[][]> {
    return this.embeddingEngine.embedText(texts);
  }

  // -------------------------------------------------------------------------
  // Collections
  // -------------------------------------------------------------------------

  /**
   * True only when the collection's index exists. Never throws: a failed
   * lookup reads as absent.
   */
  async hasCollection(collection: string): Promise<boolean> {
    const lookup = await this.lookup(collection);
    return lookup.status === "found";
  }

  /**
   * Creates the collection's index unless it already exists.
   *
   * Runs under the engine's collection lock. The schema argument is ignored;
   * the index always has a TAG on id and a cosine HNSW vector field sized by
   * the embedding engine.
   *
   * @throws ProtocolError when FT.CREATE is not acknowledged
   */
  async createCollection(collection: string, _schema?: unknown): Promise<void> {
    await this.collectionLock.runExclusive(async () => {
      try {
        const lookup = await this.lookup(collection);
        if (lookup.status === "found") {
          this.logger.info(`Collection ${collection} already exists`);
          return;
        }
        if (lookup.status === "error") throw lookup.error;

        const connection = await this.getConnection();
        await createIndex(connection, collection, this.embeddingEngine.getVectorSize());
        this.logger.info(`Created collection ${collection}`);
      } catch (error) {
        this.logger.error(`Error creating collection ${collection}: ${describe(error)}`);
        throw error;
      }
    });
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /**
   * Embeds and stores data points.
   *
   * One embedding call for the batch, then every JSON.SET concurrently.
   * Writes are not atomic: if one fails, others may already have landed.
   *
   * @throws CollectionNotFoundError when the collection does not exist
   */
  async createDataPoints(collection: string, points: DataPoint[]): Promise<void> {
    try {
      await this.requireCollection(collection);
      if (points.length === 0) return;

      const vectors = await this.embedData(points.map(getEmbeddableText));
      if (vectors.length !== points.length) {
        throw new Error(
          `Embedding engine returned ${vectors.length} vectors for ${points.length} data points`
        );
      }

      const connection = await this.getConnection();
      await Promise.all(
        points.map(async (point, i) => {
          const document = toStorageDocument(point, vectors[i]);
          const reply = await connection.sendCommand("JSON.SET", [
            documentKey(collection, document.id),
            "$",
            JSON.stringify(document),
          ]);
          if (!isOkReply(reply)) {
            throw new ProtocolError(
              "JSON.SET",
              `JSON.SET failed for ${documentKey(collection, document.id)}`
            );
          }
        })
      );
    } catch (error) {
      this.logger.error(
        `Error creating data points in collection ${collection}: ${describe(error)}`
      );
      throw error;
    }
  }

  /**
   * Deletes documents by id in one DEL.
   *
   * @returns How many documents existed and were removed
   */
  async deleteDataPoints(
    collection: string,
    ids: DataPointId[]
  ): Promise<DeleteResult> {
    if (ids.length === 0) return { deleted: 0 };

    try {
      const connection = await this.getConnection();
      const keys = ids.map((id) => documentKey(collection, String(id)));
      const deleted = parseIntegerReply("DEL", await connection.sendCommand("DEL", keys));
      this.logger.info(`Deleted ${deleted} data points from collection ${collection}`);
      return { deleted };
    } catch (error) {
      this.logger.error(
        `Error deleting data points from collection ${collection}: ${describe(error)}`
      );
      throw error;
    }
  }

  /**
   * Drops every index in the store, in FT._LIST order, and deletes the
   * documents under each dropped collection's key prefix.
   *
   * Stops at the first error; indexes dropped before it stay dropped.
   */
  async prune(): Promise<void> {
    try {
      const connection = await this.getConnection();
      const indexes = parseIndexList(await connection.sendCommand("FT._LIST"));

      for (const index of indexes) {
        await connection.sendCommand("FT.DROPINDEX", [index]);
        this.logger.info(`Dropped index ${index}`);

        const collection = collectionFromIndex(index);
        if (collection !== null) {
          const removed = await this.deleteKeysWithPrefix(connection, keyPrefix(collection));
          this.logger.info(`Deleted ${removed} documents of collection ${collection}`);
        }
      }
    } catch (error) {
      this.logger.error(`Error during prune: ${describe(error)}`);
      throw error;
    }
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * Fetches stored payloads by id, in id order. Ids with no document are
   * skipped. A document whose payload cannot be parsed comes back as the raw
   * stored text.
   *
   * Best-effort: any failure is logged and yields [].
   */
  async retrieve(
    collection: string,
    ids: DataPointId[]
  ): Promise<RetrievedPayload[]> {
    try {
      const connection = await this.getConnection();
      const results: RetrievedPayload[] = [];

      for (const id of ids) {
        const reply = normalizeReply(
          await connection.sendCommand("JSON.GET", [documentKey(collection, String(id)), "$"])
        );
        if (typeof reply !== "string" || reply === "") continue;
        results.push(decodeStoredDocument(reply));
      }

      return results;
    } catch (error) {
      this.logger.error(
        `Error retrieving data points from collection ${collection}: ${describe(error)}`
      );
      return [];
    }
  }

  /**
   * Finds the nearest neighbours of a query.
   *
   * - limit defaults to 15; null searches the whole collection
   * - a missing collection returns []
   * - results are ordered by ascending cosine distance
   *
   * @throws MissingQueryParameterError when neither queryText nor queryVector is set
   */
  async search(collection: string, request: SearchRequest): Promise<ScoredResult[]> {
    if (request.queryText == null && request.queryVector == null) {
      throw new MissingQueryParameterError();
    }

    const lookup = await this.lookup(collection);
    if (lookup.status === "missing") {
      this.logger.warn(`Collection '${collection}' not found in search; returning [].`);
      return [];
    }
    if (lookup.status === "error") {
      this.logger.error(`Error looking up collection ${collection}: ${describe(lookup.error)}`);
      throw lookup.error;
    }

    const limit =
      request.limit === undefined ? DEFAULT_SEARCH_LIMIT : request.limit ?? lookup.info.numDocs;
    if (limit <= 0) return [];

    try {
      const vector = await this.resolveQueryVector(request);
      const connection = await this.getConnection();
      const reply = await connection.sendCommand(
        "FT.SEARCH",
        buildKnnSearchArgs(collection, vector, limit, request.withVector ?? false)
      );
      return sortByScore(decodeScoredResults(toSearchResponse(reply)));
    } catch (error) {
      this.logger.error(`Error during search in collection ${collection}: ${describe(error)}`);
      throw error;
    }
  }

  /**
   * Runs one search per query text, concurrently, after a single embedding
   * call for all of them.
   *
   * Each result list keeps only hits with score < scoreThreshold (cosine
   * distance: smaller is closer; hits without a score are dropped). The
   * output is aligned with queryTexts, empty lists included.
   */
  async batchSearch(
    collection: string,
    queryTexts: string[],
    options?: BatchSearchOptions
  ): Promise<ScoredResult[][]> {
    const limit = options?.limit === undefined ? DEFAULT_SEARCH_LIMIT : options.limit;
    const withVectors = options?.withVectors ?? false;
    const scoreThreshold = options?.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;

    const lookup = await this.lookup(collection);
    if (lookup.status === "missing") {
      this.logger.warn(`Collection '${collection}' not found in batchSearch; returning [].`);
      return [];
    }
    if (lookup.status === "error") {
      this.logger.error(`Error looking up collection ${collection}: ${describe(lookup.error)}`);
      throw lookup.error;
    }

    if (queryTexts.length === 0) return [];

    const vectors = await this.embedData(queryTexts);
    const groups = await Promise.all(
      vectors.map((queryVector) =>
        this.search(collection, { queryVector, limit, withVector: withVectors })
      )
    );

    return groups.map((group) =>
      group.filter((result) => result.score !== null && result.score < scoreThreshold)
    );
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  /**
   * Looks the collection up, folding a failure to connect into "error".
   */
  private async lookup(collection: string): Promise<CollectionLookup> {
    let connection: StoreConnection;
    try {
      connection = await this.getConnection();
    } catch (error) {
      return { status: "error", error };
    }
    return lookupCollection(connection, collection);
  }

  /**
   * Hard existence check for write paths.
   */
  private async requireCollection(collection: string): Promise<void> {
    const lookup = await this.lookup(collection);
    if (lookup.status === "missing") throw new CollectionNotFoundError(collection);
    if (lookup.status === "error") throw lookup.error;
  }

  private async resolveQueryVector(request: SearchRequest): Promise<number[]> {
    if (request.queryVector != null) return request.queryVector;
    if (request.queryText == null) throw new MissingQueryParameterError();

    const [vector] = await this.embedData([request.queryText]);
    if (!vector) {
      throw new Error("Embedding engine returned no vector for the query");
    }
    return vector;
  }

  /**
   * Deletes every key under a prefix, one SCAN page at a time.
   *
   * @returns Number of keys removed
   */
  private async deleteKeysWithPrefix(
    connection: StoreConnection,
    prefix: string
  ): Promise<number> {
    const pattern = `${escapeGlob(prefix)}*`;
    let cursor = "0";
    let removed = 0;

    do {
      const page = parseScanReply(
        await connection.sendCommand("SCAN", [cursor, "MATCH", pattern, "COUNT", SCAN_PAGE_SIZE])
      );
      cursor = page.cursor;
      if (page.keys.length > 0) {
        removed += parseIntegerReply("DEL", await connection.sendCommand("DEL", page.keys));
      }
    } while (cursor !== "0");

    return removed;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
