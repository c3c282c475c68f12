/**
 * embeddings.ts - Voyage AI embedding engine
 *
 * What this file does:
 * Implements the EmbeddingEngine interface using Voyage AI's embedding API.
 * The vector engine calls it once per insert batch and once per text query.
 *
 * How it works:
 * 1. Text strings go in
 * 2. Voyage AI's API returns fixed-length vectors (1024 dimensions for voyage-4)
 * 3. getVectorSize() reports that length so the index schema matches it
 *
 * The dimensionality is configuration, not discovered: FT.CREATE needs it
 * before the first embedding call is ever made.
 */

import { VoyageAIClient } from "voyageai";
import type { EmbeddingEngine } from "./types";

/**
 * Default embedding model and its vector length.
 */
const DEFAULT_MODEL = "voyage-4";
const DEFAULT_DIMENSIONS = 1024;

export interface VoyageEmbeddingOptions {
  /** Voyage AI API key. Defaults to the VOYAGE_API_KEY env var. */
  apiKey?: string;
  /** Model name. Defaults to "voyage-4". */
  model?: string;
  /**
   * Vector length the model produces. Defaults to 1024.
   *
   * Not sent to the API: it must equal the model's native output size, or
   * every embedText() call fails the length check.
   */
  dimensions?: number;
}

/**
 * Embedding engine backed by Voyage AI.
 *
 * Usage:
 *   const embedder = new VoyageEmbedding();  // uses VOYAGE_API_KEY env var
 *   const vectors = await embedder.embedText(["hello", "world"]);
 *   embedder.getVectorSize(); // 1024
 */
export class VoyageEmbedding implements EmbeddingEngine {
  private readonly client: VoyageAIClient;
  private readonly model: string;
  private readonly dimensions: number;

  /**
   * @throws Error when no API key is configured
   */
  constructor(options?: VoyageEmbeddingOptions) {
    const apiKey = options?.apiKey ?? process.env.VOYAGE_API_KEY;
    if (!apiKey) {
      throw new Error(
        "Voyage AI API key is required. Set VOYAGE_API_KEY environment variable " +
          "or pass apiKey in options."
      );
    }

    this.client = new VoyageAIClient({ apiKey });
    this.model = options?.model ?? DEFAULT_MODEL;
    this.dimensions = options?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  getVectorSize(): number {
    return this.dimensions;
  }

  /**
   * Converts text strings into embedding vectors in one API request.
   *
   * An empty input returns [] without calling the API.
   *
   * @throws Error if the API call fails, returns no data, or returns vectors
   *   of the wrong length
   */
  async embedText(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embed({
      input: texts,
      model: this.model,
    });

    // The API returns { data: [{ embedding: number[], index: number }, ...] }
    if (!response.data) {
      throw new Error("Voyage AI returned no embedding data");
    }

    // Sort by index so the order matches the input order
    const sorted = [...response.data].sort(
      (a, b) => (a.index ?? 0) - (b.index ?? 0)
    );

    return sorted.map((item) => {
      if (!item.embedding) {
        throw new Error("Voyage AI returned an embedding without vector data");
      }
      if (item.embedding.length !== this.dimensions) {
        throw new Error(
          `Voyage AI returned a ${item.embedding.length}-dimensional vector; ` +
            `expected ${this.dimensions}. Check EMBEDDING_DIMENSIONS for model ${this.model}.`
        );
      }
      return item.embedding;
    });
  }
}
