/**
 * schema.ts - Collection naming, index lookup and index creation
 *
 * A collection is one Valkey search index plus the JSON documents under its
 * key prefix:
 *
 *   collection "docs"  →  index "index:docs"
 *                         documents "vdb:docs:{id}"
 *
 * The index has two fields: a TAG on $.id and an HNSW vector field on
 * $.vector (float32, cosine distance, dimensionality from the embedding
 * engine).
 */

import type { CommandArgument, StoreConnection } from "../utils/valkey-client";
import { ProtocolError } from "./errors";
import {
  isOkReply,
  normalizeReply,
  parseIndexInfo,
  type IndexInfo,
} from "./protocol";

/** Index identifier for a collection. */
export function indexName(collection: string): string {
  return `index:${collection}`;
}

/** Key prefix shared by every document in a collection. */
export function keyPrefix(collection: string): string {
  return `vdb:${collection}:`;
}

/** Storage key for one document. */
export function documentKey(collection: string, id: string): string {
  return `${keyPrefix(collection)}${id}`;
}

/**
 * Inverse of indexName(): the collection an index belongs to, or null for
 * indexes this engine did not create.
 */
export function collectionFromIndex(index: string): string | null {
  return index.startsWith("index:") ? index.slice("index:".length) : null;
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/**
 * Outcome of looking a collection up. "missing" is the store saying the
 * index does not exist; "error" is anything else going wrong.
 */
export type CollectionLookup =
  | { status: "found"; info: IndexInfo }
  | { status: "missing" }
  | { status: "error"; error: unknown };

/**
 * Messages the search module uses for an unknown index, across versions.
 */
const MISSING_INDEX_PATTERN = /not found|unknown index|no such index/i;

/**
 * Runs FT.INFO for the collection's index and classifies the outcome.
 * Never throws.
 */
export async function lookupCollection(
  connection: StoreConnection,
  collection: string
): Promise<CollectionLookup> {
  try {
    const reply = await connection.sendCommand("FT.INFO", [indexName(collection)]);
    return { status: "found", info: parseIndexInfo(reply) };
  } catch (error) {
    if (
      error instanceof Error &&
      !(error instanceof ProtocolError) &&
      MISSING_INDEX_PATTERN.test(error.message)
    ) {
      return { status: "missing" };
    }
    return { status: "error", error };
  }
}

// ---------------------------------------------------------------------------
// Creation
// ---------------------------------------------------------------------------

/**
 * Builds the FT.CREATE arguments for a collection.
 *
 * Example for ("docs", 3):
 *   index:docs ON JSON PREFIX 1 vdb:docs: SCHEMA
 *     $.id AS id TAG
 *     $.vector AS vector VECTOR HNSW 6 TYPE FLOAT32 DIM 3 DISTANCE_METRIC COSINE
 */
export function buildCreateIndexArgs(
  collection: string,
  dimensions: number
): CommandArgument[] {
  return [
    indexName(collection),
    "ON", "JSON",
    "PREFIX", 1, keyPrefix(collection),
    "SCHEMA",
    "$.id", "AS", "id", "TAG",
    "$.vector", "AS", "vector", "VECTOR", "HNSW", 6,
    "TYPE", "FLOAT32",
    "DIM", dimensions,
    "DISTANCE_METRIC", "COSINE",
  ];
}

/**
 * Issues FT.CREATE for a collection.
 *
 * @throws ProtocolError when the store does not acknowledge with OK
 */
export async function createIndex(
  connection: StoreConnection,
  collection: string,
  dimensions: number
): Promise<void> {
  const index = indexName(collection);
  const reply = await connection.sendCommand(
    "FT.CREATE",
    buildCreateIndexArgs(collection, dimensions)
  );
  if (!isOkReply(reply)) {
    throw new ProtocolError(
      "FT.CREATE",
      `FT.CREATE failed for index '${index}': ${JSON.stringify(normalizeReply(reply))}`
    );
  }
}

// ---------------------------------------------------------------------------
// Lock
// ---------------------------------------------------------------------------

/**
 * Runs async tasks one at a time, in call order.
 *
 * Used around collection creation so two concurrent createCollection() calls
 * cannot both see "missing" and both issue FT.CREATE. A failed task does not
 * block the ones queued after it.
 */
export class CollectionLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}
