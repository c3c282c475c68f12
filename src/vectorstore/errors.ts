/**
 * errors.ts - Error types raised by the vector engine
 *
 * Each class sets `name` so callers (and log lines) can tell them apart
 * without instanceof checks across module boundaries.
 */

/**
 * The engine could not be built: no embedding engine, an unknown provider,
 * or invalid configuration.
 */
export class VectorEngineInitializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VectorEngineInitializationError";
  }
}

/**
 * A write was attempted against a collection whose index does not exist.
 * Read paths never raise this; they return empty results instead.
 */
export class CollectionNotFoundError extends Error {
  readonly collection: string;

  constructor(collection: string) {
    super(`Collection ${collection} not found!`);
    this.name = "CollectionNotFoundError";
    this.collection = collection;
  }
}

/**
 * search() was called with neither query text nor a query vector.
 */
export class MissingQueryParameterError extends Error {
  constructor(message = "One of query_text or query_vector must be provided!") {
    super(message);
    this.name = "MissingQueryParameterError";
  }
}

/**
 * The store answered a command with something other than what the command
 * promises (a failed FT.CREATE acknowledgement, an unexpected reply shape).
 */
export class ProtocolError extends Error {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
    this.command = command;
  }
}
