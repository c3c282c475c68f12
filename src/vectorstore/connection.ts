/**
 * connection.ts - Lazily opened, shared store connection
 *
 * One ConnectionManager per engine instance. The first getConnection() opens
 * the connection; later calls reuse it until close().
 *
 * Concurrent first use:
 * Calls that arrive while the connection is still opening await the same
 * pending open, so an engine never holds two live connections. A failed open
 * clears the pending state and the next call tries again.
 *
 * There is no health check: a connection that breaks mid-session is only
 * replaced after an explicit close().
 */

import {
  DEFAULT_RECONNECT_POLICY,
  DEFAULT_REQUEST_TIMEOUT_MS,
  openValkeyConnection,
  type ConnectionSettings,
  type ReconnectPolicy,
  type StoreConnection,
} from "../utils/valkey-client";
import { VectorEngineInitializationError } from "./errors";
import type { EngineLogger } from "./types";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 6379;

/** Schemes that turn TLS on without an explicit useTls option. */
const TLS_SCHEMES = new Set(["valkeys:", "rediss:"]);

/** A scheme followed by "//", as in valkey:// */
const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;

/** Scheme plus optional userinfo, where the authority's host is empty. */
const EMPTY_HOST = /^([^:]+:\/\/(?:[^@/?#]*@)?)(?=:|[/?#]|$)/;

/**
 * Extracts host, port and the TLS hint from a connection URL.
 *
 * A missing host means localhost and a missing port means 6379. Text
 * without a scheme ("cache:6380") is read as a valkey:// URL, and an
 * empty string gives the defaults.
 *
 * Example:
 *   parseConnectionUrl("valkey://cache.internal:6380")
 *   // → { host: "cache.internal", port: 6380, useTls: false }
 *
 *   parseConnectionUrl("valkey://:6379")
 *   // → { host: "localhost", port: 6379, useTls: false }
 *
 * @throws VectorEngineInitializationError when the text cannot be read as a
 *   URL (spaces in the host, a port outside 0-65535)
 */
export function parseConnectionUrl(url: string): {
  host: string;
  port: number;
  useTls: boolean;
} {
  const trimmed = url.trim();
  if (trimmed === "") {
    return { host: DEFAULT_HOST, port: DEFAULT_PORT, useTls: false };
  }

  const withScheme = SCHEME_PREFIX.test(trimmed) ? trimmed : `valkey://${trimmed}`;
  const normalized = withScheme.replace(EMPTY_HOST, `$1${DEFAULT_HOST}`);

  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch (error) {
    throw new VectorEngineInitializationError(
      `Invalid connection URL "${url}". Expected a URL like valkey://host:port.`,
      { cause: error }
    );
  }

  // IPv6 literals keep their brackets in URL.hostname
  const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1") || DEFAULT_HOST;
  const port = parsed.port ? parseInt(parsed.port, 10) : DEFAULT_PORT;
  return { host, port, useTls: TLS_SCHEMES.has(parsed.protocol) };
}

/**
 * True when parseConnectionUrl() accepts the text.
 */
export function isValidConnectionUrl(url: string): boolean {
  try {
    parseConnectionUrl(url);
    return true;
  } catch (error) {
    if (error instanceof VectorEngineInitializationError) return false;
    throw error;
  }
}

export interface ConnectionManagerOptions {
  url: string;
  /** Force TLS on (or off) regardless of the URL scheme */
  useTls?: boolean;
  requestTimeoutMs?: number;
  reconnect?: ReconnectPolicy;
  /** Opens the underlying connection. Defaults to the ioredis transport. */
  connect?: (settings: ConnectionSettings) => Promise<StoreConnection>;
  logger?: EngineLogger;
}

export class ConnectionManager {
  readonly settings: ConnectionSettings;
  private readonly connect: (settings: ConnectionSettings) => Promise<StoreConnection>;
  private readonly logger: EngineLogger;

  private connection: StoreConnection | null = null;
  private pending: Promise<StoreConnection> | null = null;

  constructor(options: ConnectionManagerOptions) {
    const { host, port, useTls } = parseConnectionUrl(options.url);
    this.settings = {
      host,
      port,
      useTls: options.useTls ?? useTls,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      reconnect: options.reconnect ?? DEFAULT_RECONNECT_POLICY,
    };
    this.connect = options.connect ?? openValkeyConnection;
    this.logger = options.logger ?? console;
  }

  /** True once a connection has been opened and not yet closed. */
  get isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Returns the cached connection, opening one on first use.
   */
  async getConnection(): Promise<StoreConnection> {
    if (this.connection) return this.connection;
    if (this.pending) return this.pending;

    this.pending = this.connect(this.settings)
      .then((connection) => {
        this.connection = connection;
        return connection;
      })
      .finally(() => {
        this.pending = null;
      });

    return this.pending;
  }

  /**
   * Closes the connection and resets to disconnected.
   *
   * Close-time errors are logged and swallowed; the state is reset either way.
   */
  async close(): Promise<void> {
    const connection = this.connection ?? (await this.settlePending());
    this.connection = null;
    if (!connection) return;

    try {
      await connection.close();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring error while closing connection: ${message}`);
    }
  }

  /**
   * Waits for an in-flight open so close() does not leave it dangling.
   * A failed open has nothing to close.
   */
  private async settlePending(): Promise<StoreConnection | null> {
    if (!this.pending) return null;
    try {
      return await this.pending;
    } catch {
      return null;
    }
  }
}
