/**
 * registry.ts - Provider name → vector engine factory
 *
 * The coordinating service owns one registry, fills it at startup and asks
 * it for an engine by the configured provider name. Nothing registers itself
 * on import.
 *
 * Usage:
 *   const registry = createDefaultRegistry();         // has "valkey"
 *   registry.register("memory", (config, deps) => new MyEngine(deps));
 *   const engine = createVectorEngine(loadConfig(), { registry });
 */

import { loadConfig, type EngineConfig } from "../config";
import type { ConnectionSettings, StoreConnection } from "../utils/valkey-client";
import { VoyageEmbedding } from "./embeddings";
import { VectorEngineInitializationError } from "./errors";
import type { EmbeddingEngine, EngineLogger, VectorEngine } from "./types";
import { ValkeyBackend } from "./valkey-backend";

/**
 * What a factory receives besides configuration.
 */
export interface EngineDependencies {
  embeddingEngine: EmbeddingEngine;
  logger?: EngineLogger;
  /** Overrides how connections are opened (tests use an in-process store) */
  connect?: (settings: ConnectionSettings) => Promise<StoreConnection>;
}

export type VectorEngineFactory = (
  config: EngineConfig,
  dependencies: EngineDependencies
) => VectorEngine;

export class VectorEngineRegistry {
  private readonly factories = new Map<string, VectorEngineFactory>();

  /**
   * Registers a factory. Provider names are case-insensitive.
   *
   * @throws VectorEngineInitializationError when the name is already taken
   */
  register(provider: string, factory: VectorEngineFactory): this {
    const key = provider.toLowerCase();
    if (this.factories.has(key)) {
      throw new VectorEngineInitializationError(
        `Vector engine provider "${provider}" is already registered`
      );
    }
    this.factories.set(key, factory);
    return this;
  }

  has(provider: string): boolean {
    return this.factories.has(provider.toLowerCase());
  }

  /** Registered provider names, in registration order. */
  providers(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Builds the engine for config.provider.
   *
   * @throws VectorEngineInitializationError for an unknown provider
   */
  create(config: EngineConfig, dependencies: EngineDependencies): VectorEngine {
    const factory = this.factories.get(config.provider.toLowerCase());
    if (!factory) {
      const known = this.providers().join(", ") || "none";
      throw new VectorEngineInitializationError(
        `Unknown vector engine provider "${config.provider}". Registered providers: ${known}`
      );
    }
    return factory(config, dependencies);
  }
}

/**
 * Factory for the Valkey backend.
 */
export const valkeyEngineFactory: VectorEngineFactory = (config, dependencies) =>
  new ValkeyBackend(dependencies.embeddingEngine, {
    url: config.url,
    useTls: config.useTls || undefined,
    logger: dependencies.logger,
    connect: dependencies.connect,
  });

/**
 * A registry with the built-in providers registered.
 */
export function createDefaultRegistry(): VectorEngineRegistry {
  return new VectorEngineRegistry().register("valkey", valkeyEngineFactory);
}

export interface CreateVectorEngineOptions extends Partial<EngineDependencies> {
  registry?: VectorEngineRegistry;
}

/**
 * Builds the configured vector engine.
 *
 * Uses the Voyage AI embedding engine from config.embedding unless one is
 * injected, and the default registry unless one is passed.
 */
export function createVectorEngine(
  config: EngineConfig = loadConfig(),
  options: CreateVectorEngineOptions = {}
): VectorEngine {
  const registry = options.registry ?? createDefaultRegistry();
  const embeddingEngine =
    options.embeddingEngine ??
    new VoyageEmbedding({
      apiKey: config.embedding.apiKey,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    });

  return registry.create(config, {
    embeddingEngine,
    logger: options.logger,
    connect: options.connect,
  });
}
