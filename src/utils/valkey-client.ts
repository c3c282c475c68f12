/**
 * valkey-client.ts - Opens Valkey connections and executes traced commands
 *
 * How it works:
 * 1. Builds ioredis options from host/port, TLS, request timeout and a
 *    bounded exponential reconnect policy
 * 2. Opens the socket (lazyConnect, so a failed first connect rejects here)
 * 3. Sends every command with callBuffer(), so replies come back exactly as
 *    the server sent them (Buffers); protocol.ts turns them into text
 *
 * This is the only file that imports ioredis. Everything else talks to the
 * StoreConnection interface, which tests implement in-process.
 *
 * OpenTelemetry instrumentation:
 * Each command creates a CLIENT span named "valkey {COMMAND}" with the OTel
 * database semconv attributes. It nests under whatever span is active.
 */

import { Redis, type RedisOptions } from "ioredis";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/** Argument types a Valkey command accepts on the wire. */
export type CommandArgument = string | number | Buffer;

/**
 * A live connection to the store.
 *
 * Replies are returned untouched (`unknown`): bulk strings may arrive as
 * Buffers or strings depending on the transport.
 */
export interface StoreConnection {
  sendCommand(command: string, args?: CommandArgument[]): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Bounded exponential backoff: attempt n waits baseDelayMs * exponentBase^(n-1).
 */
export interface ReconnectPolicy {
  retries: number;
  baseDelayMs: number;
  exponentBase: number;
}

export interface ConnectionSettings {
  host: string;
  port: number;
  useTls: boolean;
  /** Per-command timeout */
  requestTimeoutMs: number;
  reconnect: ReconnectPolicy;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  retries: 3,
  baseDelayMs: 1000,
  exponentBase: 2,
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

/**
 * Delay before reconnect attempt `attempt` (1-based), or null to give up.
 *
 * Example with the default policy: 1 → 1000, 2 → 2000, 3 → 4000, 4 → null.
 */
export function reconnectDelay(
  policy: ReconnectPolicy,
  attempt: number
): number | null {
  if (attempt < 1 || attempt > policy.retries) return null;
  return policy.baseDelayMs * policy.exponentBase ** (attempt - 1);
}

/**
 * Maps connection settings onto ioredis options.
 */
export function buildRedisOptions(settings: ConnectionSettings): RedisOptions {
  return {
    host: settings.host,
    port: settings.port,
    ...(settings.useTls ? { tls: {} } : {}),
    commandTimeout: settings.requestTimeoutMs,
    connectTimeout: settings.requestTimeoutMs,
    maxRetriesPerRequest: settings.reconnect.retries,
    retryStrategy: (times: number) => reconnectDelay(settings.reconnect, times),
    lazyConnect: true,
  };
}

/**
 * A StoreConnection backed by an ioredis client.
 */
export class ValkeyClientConnection implements StoreConnection {
  private readonly client: Redis;
  private readonly settings: ConnectionSettings;

  constructor(client: Redis, settings: ConnectionSettings) {
    this.client = client;
    this.settings = settings;
  }

  /**
   * Sends one command inside a CLIENT span.
   *
   * Span attributes:
   * - db.system.name: always "valkey"
   * - db.operation.name: the command (e.g., FT.SEARCH)
   * - db.collection.name: the index name or key, when the first argument is text
   * - server.address / server.port
   */
  async sendCommand(
    command: string,
    args: CommandArgument[] = []
  ): Promise<unknown> {
    const tracer = getTracer();

    return tracer.startActiveSpan(
      `valkey ${command}`,
      { kind: SpanKind.CLIENT },
      async (span) => {
        span.setAttribute("db.system.name", "valkey");
        span.setAttribute("db.operation.name", command);
        const target = args[0];
        if (typeof target === "string") {
          span.setAttribute("db.collection.name", target);
        }
        span.setAttribute("server.address", this.settings.host);
        span.setAttribute("server.port", this.settings.port);

        try {
          const reply = await this.client.callBuffer(command, args);
          span.setStatus({ code: SpanStatusCode.OK });
          return reply;
        } catch (error) {
          const failure = error instanceof Error ? error : new Error(String(error));
          span.setAttribute("error.type", failure.name);
          span.recordException(failure);
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: failure.message,
          });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  /**
   * Sends QUIT and waits for the server to acknowledge.
   */
  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Opens a connection to Valkey.
 *
 * If the first connect fails the client is disconnected (stopping its
 * reconnect loop) and the error propagates.
 */
export async function openValkeyConnection(
  settings: ConnectionSettings
): Promise<StoreConnection> {
  const client = new Redis(buildRedisOptions(settings));
  try {
    await client.connect();
  } catch (error) {
    client.disconnect();
    throw error;
  }
  return new ValkeyClientConnection(client, settings);
}
