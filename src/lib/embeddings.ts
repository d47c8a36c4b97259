/**
 * Dense embedding providers:
 * - API: any OpenAI-compatible /v1/embeddings endpoint (Ollama, llama.cpp, LM Studio, OpenRouter, ...)
 * - hashing: deterministic, offline
 *
 * Failures are raised as EmbeddingError and never replaced by a zero vector.
 * There is no retry: callers own their retry policy.
 */

import { z } from 'zod';
import { hashTerm, tokenize } from './bm25.js';
import { ConfigError, EmbeddingError, ValidationError } from './errors.js';
import type { EmbeddingSettings } from './config-types.js';

export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().optional(),
      })
    )
    .min(1),
  model: z.string().optional(),
});

export function validateEmbedding(embedding: number[], expectedDimensions: number): void {
  if (embedding.length !== expectedDimensions) {
    throw new EmbeddingError(
      `Embedding dimension mismatch: expected ${expectedDimensions}, got ${embedding.length}`,
      { operation: 'embed' }
    );
  }
  if (embedding.some((v) => !Number.isFinite(v))) {
    throw new EmbeddingError('Embedding contains NaN or Infinity values', { operation: 'embed' });
  }
}

/**
 * fetch with a timeout, also honouring the caller's signal. A caller abort
 * rejects with the caller's reason; the timeout rejects with EmbeddingError.
 */
async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  signal?.throwIfAborted();

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const forwardAbort = (): void => controller.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } catch (error) {
    if (signal?.aborted) throw signal.reason;
    if (controller.signal.aborted) {
      throw new EmbeddingError(`Embedding request timeout after ${timeoutMs}ms`, {
        operation: 'embed',
      });
    }
    throw new EmbeddingError(
      `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
      { operation: 'embed' },
      { cause: error }
    );
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

export class ApiEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;

  constructor(private readonly settings: EmbeddingSettings) {
    if (!settings.api_url) {
      throw new ConfigError('Embedding API URL is required', { operation: 'embed' });
    }
    this.dimensions = settings.dimensions;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.settings.api_key) {
      headers['Authorization'] = `Bearer ${this.settings.api_key}`;
    }

    const response = await fetchWithTimeout(
      this.settings.api_url,
      {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.settings.model,
          input: [text],
          dimensions: this.settings.dimensions,
        }),
      },
      this.settings.timeout_ms,
      signal
    );

    if (!response.ok) {
      const body = await response.text();
      throw new EmbeddingError(
        `Embedding API error: ${response.status} - ${body}`,
        { operation: 'embed', model: this.settings.model },
        { statusCode: response.status }
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new EmbeddingError('Embedding API returned invalid JSON', { operation: 'embed' }, { cause: error });
    }

    const parsed = EmbeddingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Embedding API returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        { operation: 'embed' }
      );
    }

    const embedding = parsed.data.data[0].embedding;
    validateEmbedding(embedding, this.dimensions);
    return embedding;
  }
}

/**
 * Deterministic bag-of-words embedding: stemmed terms hashed into
 * `dimensions` buckets, L2-normalized. No model and no network, so texts
 * only match on shared words. Used for offline runs and tests.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new ValidationError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    signal?.throwIfAborted();
    const vector = zeroVector(this.dimensions);
    for (const term of tokenize(text)) {
      vector[hashTerm(term) % this.dimensions] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function zeroVector(dimensions: number): number[] {
  return new Array<number>(dimensions).fill(0);
}

/**
 * Cosine similarity between two vectors.
 * Returns 0 for zero-vectors to avoid division by zero.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError('Vectors must have same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}
