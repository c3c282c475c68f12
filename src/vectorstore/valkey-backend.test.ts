/**
 * valkey-backend.test.ts - Unit tests for the Valkey vector engine
 *
 * Runs the engine against the in-process Valkey stand-in and a fake
 * embedding engine with a fixed vector table, so scores are predictable:
 *
 *   apple     → [1, 0, 0]
 *   banana    → [0, 1, 0]
 *   cherry    → [0, 0, 1]
 *   apple pie → [0.9, 0.1, 0]
 *   (others)  → [1, 1, 1]
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  CollectionNotFoundError,
  MissingQueryParameterError,
  VectorEngineInitializationError,
} from "./errors";
import { FakeEmbeddingEngine } from "./testing/fake-embedding";
import { InMemoryValkey } from "./testing/in-memory-valkey";
import type { EmbeddingEngine } from "./types";
import { ValkeyBackend, buildKnnSearchArgs, escapeGlob } from "./valkey-backend";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const VECTORS: Record<string, number[]> = {
  apple: [1, 0, 0],
  banana: [0, 1, 0],
  cherry: [0, 0, 1],
  "apple pie": [0.9, 0.1, 0],
};

/** Cosine distance between "apple" and "apple pie". */
const APPLE_PIE_DISTANCE = 1 - 0.9 / Math.sqrt(0.82);

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Creates an engine wired to a fresh in-memory store.
 */
function setup(embeddingEngine: EmbeddingEngine = new FakeEmbeddingEngine(VECTORS)) {
  const store = new InMemoryValkey();
  const logger = createLogger();
  const connect = vi.fn(async () => store);
  const backend = new ValkeyBackend(embeddingEngine, {
    url: "valkey://localhost:6379",
    connect,
    logger,
  });
  return { store, logger, connect, backend };
}

/**
 * An engine whose "docs" collection holds apple, banana, cherry and apple pie.
 */
async function seeded() {
  const embedder = new FakeEmbeddingEngine(VECTORS);
  const context = setup(embedder);
  await context.backend.createCollection("docs");
  await context.backend.createDataPoints("docs", [
    { id: "a", text: "apple" },
    { id: "b", text: "banana" },
    { id: "c", text: "cherry" },
    { id: "pie", text: "apple pie" },
  ]);
  return { ...context, embedder };
}

// ---------------------------------------------------------------------------
// Construction and lifecycle
// ---------------------------------------------------------------------------

describe("ValkeyBackend construction", () => {
  const originalUrl = process.env.VECTOR_DB_URL;

  afterEach(() => {
    if (originalUrl === undefined) delete process.env.VECTOR_DB_URL;
    else process.env.VECTOR_DB_URL = originalUrl;
  });

  it("requires an embedding engine", () => {
    expect(() => new ValkeyBackend(null)).toThrow(VectorEngineInitializationError);
    expect(() => new ValkeyBackend(undefined)).toThrow(
      "Embedding engine is required. Provide an embedding engine to the Valkey backend."
    );
  });

  it("falls back to VECTOR_DB_URL when no url is given", async () => {
    process.env.VECTOR_DB_URL = "valkey://env-host:7001";
    const store = new InMemoryValkey();
    const connect = vi.fn(async () => store);
    const backend = new ValkeyBackend(new FakeEmbeddingEngine(VECTORS), { connect });

    await backend.ping();

    expect(connect).toHaveBeenCalledWith(
      expect.objectContaining({ host: "env-host", port: 7001, useTls: false })
    );
  });

  it("falls back to localhost:6379 without url or VECTOR_DB_URL", async () => {
    delete process.env.VECTOR_DB_URL;
    const store = new InMemoryValkey();
    const connect = vi.fn(async () => store);
    const backend = new ValkeyBackend(new FakeEmbeddingEngine(VECTORS), { connect });

    await backend.ping();

    expect(connect).toHaveBeenCalledWith(
      expect.objectContaining({ host: "localhost", port: 6379 })
    );
  });

  it("treats an empty VECTOR_DB_URL as unset", async () => {
    process.env.VECTOR_DB_URL = "";
    const store = new InMemoryValkey();
    const connect = vi.fn(async () => store);
    const backend = new ValkeyBackend(new FakeEmbeddingEngine(VECTORS), { connect });

    await backend.ping();

    expect(connect).toHaveBeenCalledWith(
      expect.objectContaining({ host: "localhost", port: 6379 })
    );
  });

  it("rejects a url that cannot be parsed", () => {
    expect(
      () => new ValkeyBackend(new FakeEmbeddingEngine(VECTORS), { url: "valkey://cache:70000" })
    ).toThrow(VectorEngineInitializationError);
  });

  it("is named Valkey", () => {
    expect(setup().backend.name).toBe("Valkey");
  });
});

describe("ValkeyBackend lifecycle", () => {
  it("ping returns true for PONG", async () => {
    const { backend, store } = setup();

    await expect(backend.ping()).resolves.toBe(true);
    expect(store.calls("PING")).toHaveLength(1);
  });

  it("reuses one connection across operations", async () => {
    const { backend, connect } = setup();

    await backend.ping();
    await backend.hasCollection("docs");
    await backend.ping();

    expect(connect).toHaveBeenCalledOnce();
  });

  it("close closes the underlying connection", async () => {
    const { backend, store } = setup();
    await backend.ping();

    await backend.close();

    expect(store.closed).toBe(true);
  });

  it("embedData delegates to the embedding engine", async () => {
    const embedder = new FakeEmbeddingEngine(VECTORS);
    const { backend } = setup(embedder);

    await expect(backend.embedData(["apple", "cherry"])).resolves.toEqual([
      [1, 0, 0],
      [0, 0, 1],
    ]);
    expect(embedder.calls).toEqual([["apple", "cherry"]]);
  });
});

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

describe("hasCollection", () => {
  it("is false before and true after createCollection", async () => {
    const { backend } = setup();

    await expect(backend.hasCollection("docs")).resolves.toBe(false);
    await backend.createCollection("docs");
    await expect(backend.hasCollection("docs")).resolves.toBe(true);
  });

  it("is false when the lookup fails", async () => {
    const { backend, store } = setup();
    await backend.createCollection("docs");
    store.failWith("FT.INFO", new Error("Command timed out"));

    await expect(backend.hasCollection("docs")).resolves.toBe(false);
  });

  it("is false when the store cannot be reached", async () => {
    const backend = new ValkeyBackend(new FakeEmbeddingEngine(VECTORS), {
      url: "valkey://localhost",
      connect: async () => {
        throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
      },
      logger: createLogger(),
    });

    await expect(backend.hasCollection("docs")).resolves.toBe(false);
  });
});

describe("createCollection", () => {
  it("creates an index sized by the embedding engine", async () => {
    const { backend, store, logger } = setup(new FakeEmbeddingEngine(VECTORS, 3));

    await backend.createCollection("docs");

    expect(store.indexes.get("index:docs")).toEqual({
      name: "index:docs",
      prefixes: ["vdb:docs:"],
      dimensions: 3,
    });
    expect(logger.info).toHaveBeenCalledWith("Created collection docs");
  });

  it("does nothing when the collection already exists", async () => {
    const { backend, store, logger } = setup();
    await backend.createCollection("docs");

    await backend.createCollection("docs");

    expect(store.calls("FT.CREATE")).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith("Collection docs already exists");
  });

  it("issues one FT.CREATE for concurrent calls", async () => {
    const { backend, store } = setup();

    await Promise.all([
      backend.createCollection("docs"),
      backend.createCollection("docs"),
      backend.createCollection("docs"),
    ]);

    expect(store.calls("FT.CREATE")).toHaveLength(1);
  });

  it("ignores the schema argument", async () => {
    const { backend, store } = setup();

    await backend.createCollection("docs", { title: "TEXT" });

    expect(store.indexes.get("index:docs")?.dimensions).toBe(3);
  });

  it("rethrows a failed lookup instead of creating the index", async () => {
    const { backend, store, logger } = setup();
    store.failWith("FT.INFO", new Error("Command timed out"));

    await expect(backend.createCollection("docs")).rejects.toThrow("Command timed out");

    expect(store.calls("FT.CREATE")).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledWith(
      "Error creating collection docs: Command timed out"
    );
  });

  it("logs and rethrows FT.CREATE errors", async () => {
    const { backend, store, logger } = setup();
    store.failWith("FT.CREATE", new Error("Invalid field type"));

    await expect(backend.createCollection("docs")).rejects.toThrow("Invalid field type");

    expect(logger.error).toHaveBeenCalledWith(
      "Error creating collection docs: Invalid field type"
    );
  });
});

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

describe("createDataPoints", () => {
  it("stores each point as a JSON document with its vector and payload", async () => {
    const { store } = await seeded();

    expect(store.documents.get("vdb:docs:a")).toEqual({
      id: "a",
      vector: [1, 0, 0],
      payload_data: JSON.stringify({ id: "a", text: "apple" }),
    });
    expect(store.documents.size).toBe(4);
  });

  it("embeds all points in one call", async () => {
    const { embedder } = await seeded();

    expect(embedder.calls).toEqual([["apple", "banana", "cherry", "apple pie"]]);
  });

  it("embeds the configured index fields", async () => {
    const embedder = new FakeEmbeddingEngine(VECTORS);
    const { backend } = setup(embedder);
    await backend.createCollection("notes");

    await backend.createDataPoints("notes", [
      { id: 1, title: "apple", body: "pie", metadata: { indexFields: ["title", "body"] } },
    ]);

    expect(embedder.calls).toEqual([["apple\npie"]]);
  });

  it("throws CollectionNotFoundError for a missing collection", async () => {
    const embedder = new FakeEmbeddingEngine(VECTORS);
    const { backend, logger } = setup(embedder);

    await expect(
      backend.createDataPoints("nope", [{ id: "a", text: "apple" }])
    ).rejects.toThrow(CollectionNotFoundError);

    expect(embedder.calls).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledWith(
      "Error creating data points in collection nope: Collection nope not found!"
    );
  });

  it("rethrows a failed lookup", async () => {
    const { backend, store } = setup();
    store.failWith("FT.INFO", new Error("Command timed out"));

    await expect(
      backend.createDataPoints("docs", [{ id: "a", text: "apple" }])
    ).rejects.toThrow("Command timed out");
  });

  it("does nothing for an empty list", async () => {
    const embedder = new FakeEmbeddingEngine(VECTORS);
    const { backend, store } = setup(embedder);
    await backend.createCollection("docs");

    await backend.createDataPoints("docs", []);

    expect(embedder.calls).toHaveLength(0);
    expect(store.calls("JSON.SET")).toHaveLength(0);
  });

  it("rejects a vector count that does not match the points", async () => {
    const shortEmbedder: EmbeddingEngine = {
      getVectorSize: () => 3,
      embedText: async () => [],
    };
    const { backend, store } = setup(shortEmbedder);
    await backend.createCollection("docs");

    await expect(
      backend.createDataPoints("docs", [{ id: "a", text: "apple" }])
    ).rejects.toThrow("Embedding engine returned 0 vectors for 1 data points");
    expect(store.calls("JSON.SET")).toHaveLength(0);
  });

  it("rethrows write failures unmodified", async () => {
    const { backend, store, logger } = setup();
    await backend.createCollection("docs");
    const failure = new Error("OOM command not allowed");
    store.failWith("JSON.SET", failure);

    await expect(
      backend.createDataPoints("docs", [{ id: "a", text: "apple" }])
    ).rejects.toBe(failure);
    expect(logger.error).toHaveBeenCalledWith(
      "Error creating data points in collection docs: OOM command not allowed"
    );
  });
});

describe("deleteDataPoints", () => {
  it("deletes by id in one DEL and reports the count", async () => {
    const { backend, store, logger } = await seeded();

    await expect(backend.deleteDataPoints("docs", ["a", "missing"])).resolves.toEqual({
      deleted: 1,
    });

    expect(store.calls("DEL")).toEqual([
      { command: "DEL", args: ["vdb:docs:a", "vdb:docs:missing"] },
    ]);
    expect(store.documents.has("vdb:docs:a")).toBe(false);
    expect(logger.info).toHaveBeenCalledWith("Deleted 1 data points from collection docs");
  });

  it("returns zero without a round trip for no ids", async () => {
    const { backend, connect } = setup();

    await expect(backend.deleteDataPoints("docs", [])).resolves.toEqual({ deleted: 0 });
    expect(connect).not.toHaveBeenCalled();
  });

  it("logs and rethrows DEL errors", async () => {
    const { backend, store, logger } = await seeded();
    store.failWith("DEL", new Error("READONLY You can't write against a read only replica."));

    await expect(backend.deleteDataPoints("docs", ["a"])).rejects.toThrow("READONLY");
    expect(logger.error).toHaveBeenCalledWith(
      "Error deleting data points from collection docs: READONLY You can't write against a read only replica."
    );
  });
});

describe("prune", () => {
  it("drops every index and the documents under each collection prefix", async () => {
    const { backend, store, logger } = await seeded();
    await backend.createCollection("notes");
    await backend.createDataPoints("notes", [{ id: "n1", text: "cherry" }]);
    store.documents.set("session:42", { id: "42" });

    await backend.prune();

    expect(store.indexes.size).toBe(0);
    expect([...store.documents.keys()]).toEqual(["session:42"]);
    expect(logger.info).toHaveBeenCalledWith("Dropped index index:docs");
    expect(logger.info).toHaveBeenCalledWith("Deleted 4 documents of collection docs");
    expect(logger.info).toHaveBeenCalledWith("Deleted 1 documents of collection notes");
  });

  it("drops foreign indexes without touching their documents", async () => {
    const { backend, store } = setup();
    await store.sendCommand("FT.CREATE", [
      "products", "ON", "JSON", "PREFIX", 1, "prod:", "SCHEMA", "$.v", "AS", "v",
      "VECTOR", "HNSW", 6, "TYPE", "FLOAT32", "DIM", 3, "DISTANCE_METRIC", "COSINE",
    ]);
    store.documents.set("prod:1", { v: [1, 0, 0] });

    await backend.prune();

    expect(store.indexes.size).toBe(0);
    expect(store.documents.has("prod:1")).toBe(true);
    expect(store.calls("SCAN")).toHaveLength(0);
  });

  it("pages through large collections", async () => {
    const { backend, store, logger } = setup();
    await backend.createCollection("big");
    for (let i = 0; i < 600; i++) {
      store.documents.set(`vdb:big:${i}`, { id: String(i) });
    }

    await backend.prune();

    expect(store.documents.size).toBe(0);
    expect(store.calls("SCAN")).toHaveLength(2);
    expect(logger.info).toHaveBeenCalledWith("Deleted 600 documents of collection big");
  });

  it("matches the key prefix literally", async () => {
    const { backend, store } = setup();
    await backend.createCollection("a*");
    store.documents.set("vdb:a*:1", { id: "1" });
    store.documents.set("vdb:ab:1", { id: "1" });

    await backend.prune();

    expect([...store.documents.keys()]).toEqual(["vdb:ab:1"]);
  });

  it("logs and rethrows the first error", async () => {
    const { backend, store, logger } = await seeded();
    store.failWith("FT.DROPINDEX", new Error("Unknown index name"));

    await expect(backend.prune()).rejects.toThrow("Unknown index name");
    expect(logger.error).toHaveBeenCalledWith("Error during prune: Unknown index name");
    expect(store.documents.size).toBe(4);
  });
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe("retrieve", () => {
  it("returns payloads in id order, skipping unknown ids", async () => {
    const { backend } = await seeded();

    await expect(backend.retrieve("docs", ["b", "zzz", "a"])).resolves.toEqual([
      { id: "b", text: "banana" },
      { id: "a", text: "apple" },
    ]);
  });

  it("finds numeric ids by their string form", async () => {
    const { backend } = setup();
    await backend.createCollection("docs");
    await backend.createDataPoints("docs", [{ id: 7, text: "cherry" }]);

    await expect(backend.retrieve("docs", [7])).resolves.toEqual([
      { id: "7", text: "cherry" },
    ]);
  });

  it("returns the raw stored text when the payload does not parse", async () => {
    const { backend, store } = await seeded();
    store.documents.set("vdb:docs:bad", { id: "bad", payload_data: "{oops" });

    await expect(backend.retrieve("docs", ["bad"])).resolves.toEqual([
      JSON.stringify([{ id: "bad", payload_data: "{oops" }]),
    ]);
  });

  it("logs failures and returns []", async () => {
    const { backend, store, logger } = await seeded();
    store.failWith("JSON.GET", new Error("Connection is closed."));

    await expect(backend.retrieve("docs", ["a"])).resolves.toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      "Error retrieving data points from collection docs: Connection is closed."
    );
  });
});

describe("search", () => {
  it("requires query text or a query vector", async () => {
    const { backend, connect } = setup();

    await expect(backend.search("docs", {})).rejects.toThrow(MissingQueryParameterError);
    await expect(backend.search("docs", { queryText: null, queryVector: null })).rejects.toThrow(
      "One of query_text or query_vector must be provided!"
    );
    expect(connect).not.toHaveBeenCalled();
  });

  it("returns [] with a warning for a missing collection", async () => {
    const { backend, logger } = setup();

    await expect(backend.search("nope", { queryText: "apple" })).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Collection 'nope' not found in search; returning []."
    );
  });

  it("logs and rethrows a failed lookup", async () => {
    const { backend, store, logger } = await seeded();
    store.failWith("FT.INFO", new Error("Command timed out"));

    await expect(backend.search("docs", { queryText: "apple" })).rejects.toThrow(
      "Command timed out"
    );
    expect(logger.error).toHaveBeenCalledWith(
      "Error looking up collection docs: Command timed out"
    );
  });

  it("ranks hits by ascending cosine distance", async () => {
    const { backend } = await seeded();

    const results = await backend.search("docs", { queryText: "apple" });

    expect(results.map((r) => r.id)).toEqual(["a", "pie", "b", "c"]);
    expect(results[0]).toEqual({ id: "a", score: 0, payload: { id: "a", text: "apple" } });
    expect(results[1].score).toBeCloseTo(APPLE_PIE_DISTANCE, 6);
    expect(results[2].score).toBeCloseTo(1, 6);
  });

  it("embeds the query text once and sends the default KNN query", async () => {
    const { backend, store, embedder } = await seeded();

    await backend.search("docs", { queryText: "apple" });

    expect(embedder.calls.at(-1)).toEqual(["apple"]);
    expect(store.calls("FT.SEARCH")[0].args).toEqual(
      buildKnnSearchArgs("docs", [1, 0, 0], 15, false)
    );
  });

  it("uses a given query vector without embedding", async () => {
    const { backend, embedder } = await seeded();
    const callsBefore = embedder.calls.length;

    const results = await backend.search("docs", { queryVector: [0, 0, 1] });

    expect(results[0].id).toBe("c");
    expect(embedder.calls).toHaveLength(callsBefore);
  });

  it("applies the limit", async () => {
    const { backend } = await seeded();

    const results = await backend.search("docs", { queryText: "apple", limit: 2 });

    expect(results.map((r) => r.id)).toEqual(["a", "pie"]);
  });

  it("returns [] for a non-positive limit without querying", async () => {
    const { backend, store } = await seeded();

    await expect(backend.search("docs", { queryText: "apple", limit: 0 })).resolves.toEqual([]);
    await expect(backend.search("docs", { queryText: "apple", limit: -3 })).resolves.toEqual([]);
    expect(store.calls("FT.SEARCH")).toHaveLength(0);
  });

  it("searches the whole collection when limit is null", async () => {
    const { backend, store } = await seeded();

    const results = await backend.search("docs", { queryText: "apple", limit: null });

    expect(results).toHaveLength(4);
    expect(store.calls("FT.SEARCH")[0].args[1]).toBe("*=>[KNN 4 @vector $query_vector]");
  });

  it("returns [] for limit null on an empty collection", async () => {
    const { backend, store } = setup();
    await backend.createCollection("docs");

    await expect(backend.search("docs", { queryText: "apple", limit: null })).resolves.toEqual(
      []
    );
    expect(store.calls("FT.SEARCH")).toHaveLength(0);
  });

  it("includes vectors when asked", async () => {
    const { backend } = await seeded();

    const [first] = await backend.search("docs", { queryText: "banana", withVector: true });

    expect(first).toEqual({
      id: "b",
      score: 0,
      payload: { id: "b", text: "banana" },
      vector: [0, 1, 0],
    });
  });

  it("logs and rethrows query failures", async () => {
    const { backend, store, logger } = await seeded();
    store.failWith("FT.SEARCH", new Error("Query timed out"));

    await expect(backend.search("docs", { queryText: "apple" })).rejects.toThrow(
      "Query timed out"
    );
    expect(logger.error).toHaveBeenCalledWith(
      "Error during search in collection docs: Query timed out"
    );
  });
});

describe("batchSearch", () => {
  it("returns one thresholded result list per query, in order", async () => {
    const { backend } = await seeded();

    const results = await backend.batchSearch("docs", ["apple", "banana"]);

    expect(results.map((group) => group.map((r) => r.id))).toEqual([["a", "pie"], ["b"]]);
  });

  it("embeds all queries in one call", async () => {
    const { backend, embedder } = await seeded();

    await backend.batchSearch("docs", ["apple", "banana", "cherry"]);

    expect(embedder.calls.at(-1)).toEqual(["apple", "banana", "cherry"]);
    expect(embedder.calls).toHaveLength(2);
  });

  it("keeps empty result lists aligned with their queries", async () => {
    const { backend } = await seeded();

    const results = await backend.batchSearch("docs", ["unrelated", "apple"]);

    expect(results).toHaveLength(2);
    expect(results[0]).toEqual([]);
    expect(results[1].map((r) => r.id)).toEqual(["a", "pie"]);
  });

  it("applies a custom score threshold", async () => {
    const { backend } = await seeded();

    const results = await backend.batchSearch("docs", ["apple"], { scoreThreshold: 0.001 });

    expect(results[0].map((r) => r.id)).toEqual(["a"]);
  });

  it("passes limit and withVectors to each search", async () => {
    const { backend, store } = await seeded();

    const results = await backend.batchSearch("docs", ["apple"], {
      limit: 1,
      withVectors: true,
    });

    expect(store.calls("FT.SEARCH")[0].args[1]).toBe("*=>[KNN 1 @vector $query_vector]");
    expect(results[0][0].vector).toEqual([1, 0, 0]);
  });

  it("returns [] for a missing collection", async () => {
    const { backend, logger } = setup();

    await expect(backend.batchSearch("nope", ["apple"])).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Collection 'nope' not found in batchSearch; returning []."
    );
  });

  it("returns [] for no queries without embedding", async () => {
    const { backend, embedder } = await seeded();

    await expect(backend.batchSearch("docs", [])).resolves.toEqual([]);
    expect(embedder.calls).toHaveLength(1);
  });

  it("rethrows a failed lookup", async () => {
    const { backend, store } = await seeded();
    store.failWith("FT.INFO", new Error("Command timed out"));

    await expect(backend.batchSearch("docs", ["apple"])).rejects.toThrow("Command timed out");
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe("buildKnnSearchArgs", () => {
  it("returns id, payload and score, plus the vector on request", () => {
    const args = buildKnnSearchArgs("docs", [1, 0], 5, true);

    expect(args.slice(0, 5)).toEqual([
      "index:docs",
      "*=>[KNN 5 @vector $query_vector]",
      "PARAMS",
      2,
      "query_vector",
    ]);
    expect(args.slice(6)).toEqual([
      "RETURN", 12,
      "$.id", "AS", "id",
      "$.payload_data", "AS", "payload_data",
      "__vector_score", "AS", "score",
      "$.vector", "AS", "vector",
      "LIMIT", 0, 5,
      "DIALECT", 2,
    ]);
  });

  it("packs the query vector as float32 bytes", () => {
    const blob = buildKnnSearchArgs("docs", [0.5, -1], 3, false)[5];

    expect(Buffer.isBuffer(blob) && [blob.readFloatLE(0), blob.readFloatLE(4)]).toEqual([
      0.5, -1,
    ]);
  });
});

describe("escapeGlob", () => {
  it("escapes glob metacharacters", () => {
    expect(escapeGlob("vdb:a*?[x]\\:")).toBe("vdb:a\\*\\?\\[x\\]\\\\:");
  });
});
