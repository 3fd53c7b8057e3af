/**
 * embeddings.ts - Voyage AI embedding implementation
 *
 * What this file does:
 * Implements the EmbeddingFunction interface using Voyage AI's embedding API.
 * The router embeds every route utterance once at sync time and every
 * incoming query at routing time; both must come from the same model so the
 * vectors share a width and a space.
 *
 * How it works:
 * 1. Text strings go in (e.g., "I need a refund for my last order")
 * 2. Voyage AI's API returns fixed-width vectors (1024 for voyage-4)
 * 3. Similar texts produce vectors close in cosine distance
 */

import { VoyageAIClient } from "voyageai";
import type { EmbeddingFunction } from "./types";

/**
 * Default embedding model. Override with VOYAGE_MODEL or the constructor.
 */
const DEFAULT_MODEL = "voyage-4";

/** Most texts Voyage AI accepts in one embed request. */
const MAX_BATCH = 128;

/**
 * Embedding function that uses Voyage AI's API to convert text to vectors.
 *
 * Usage:
 *   const embedder = new VoyageEmbedding();  // uses VOYAGE_API_KEY env var
 *   const vectors = await embedder.embed(["where is my invoice", "hello there"]);
 */
export class VoyageEmbedding implements EmbeddingFunction {
  private readonly client: VoyageAIClient;
  private readonly model: string;

  /**
   * Creates a new Voyage AI embedding function.
   *
   * @param options - Configuration options
   * @param options.apiKey - Voyage AI API key. Defaults to VOYAGE_API_KEY env var.
   * @param options.model - Model to use. Defaults to VOYAGE_MODEL env var or "voyage-4".
   */
  constructor(options?: { apiKey?: string; model?: string }) {
    const apiKey = options?.apiKey ?? process.env.VOYAGE_API_KEY;
    if (!apiKey) {
      throw new Error(
        "Voyage AI API key is required. Set VOYAGE_API_KEY environment variable " +
          "or pass apiKey in options."
      );
    }

    this.client = new VoyageAIClient({ apiKey });
    this.model = options?.model ?? process.env.VOYAGE_MODEL ?? DEFAULT_MODEL;
  }

  /**
   * Converts text strings into embedding vectors using Voyage AI.
   *
   * Texts are sent in slices of MAX_BATCH, the API's per-request limit.
   *
   * @throws Error if the API call fails or returns unexpected data
   */
  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += MAX_BATCH) {
      vectors.push(...(await this.embedBatch(texts.slice(start, start + MAX_BATCH))));
    }
    return vectors;
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    const response = await this.client.embed({
      input: texts,
      model: this.model,
    });

    // Extract embedding vectors from the response
    // The API returns { data: [{ embedding: number[], index: number }, ...] }
    if (!response.data) {
      throw new Error("Voyage AI returned no embedding data");
    }

    // Sort by index to ensure order matches input order
    const sorted = [...response.data].sort(
      (a, b) => (a.index ?? 0) - (b.index ?? 0)
    );

    return sorted.map((item) => {
      if (!item.embedding) {
        throw new Error("Voyage AI returned an embedding without vector data");
      }
      return item.embedding;
    });
  }
}
