import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ApiEmbeddingProvider,
  HashingEmbeddingProvider,
  cosineSimilarity,
  validateEmbedding,
  zeroVector,
} from './embeddings.js';
import { ConfigError, EmbeddingError } from './errors.js';
import type { EmbeddingSettings } from './config-types.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function mockJsonResponse(data: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => data,
    text: async () => JSON.stringify(data),
  };
}

/** fetch that only settles when its request is aborted */
function hangingFetch(_url: string, init: RequestInit): Promise<never> {
  return new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
  });
}

const settings: EmbeddingSettings = {
  api_url: 'http://embeddings.test.local/v1/embeddings',
  api_key: 'test-secret',
  model: 'test-model',
  dimensions: 3,
  timeout_ms: 1000,
};

describe('ApiEmbeddingProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects a missing API URL at construction as a config error', () => {
    expect(() => new ApiEmbeddingProvider({ ...settings, api_url: '' })).toThrow(ConfigError);
    expect(() => new ApiEmbeddingProvider({ ...settings, api_url: '' })).toThrow('Embedding API URL is required');
  });

  it('posts an OpenAI-compatible request and returns the embedding', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse({ data: [{ embedding: [0.1, 0.2, 0.3] }] }));
    const provider = new ApiEmbeddingProvider(settings);

    const embedding = await provider.embed('hello');

    expect(embedding).toEqual([0.1, 0.2, 0.3]);
    expect(mockFetch).toHaveBeenCalledOnce();
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://embeddings.test.local/v1/embeddings');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(init.body)).toEqual({ model: 'test-model', input: ['hello'], dimensions: 3 });
  });

  it('omits the Authorization header without an api key', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse({ data: [{ embedding: [1, 0, 0] }] }));
    const provider = new ApiEmbeddingProvider({ ...settings, api_key: undefined });

    await provider.embed('hello');

    expect(mockFetch.mock.calls[0][1].headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('raises EmbeddingError with the status code on HTTP errors', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse({ error: 'overloaded' }, 503));
    const provider = new ApiEmbeddingProvider(settings);

    const error = await provider.embed('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      code: 'EMBEDDING_ERROR',
      statusCode: 503,
      message: 'Embedding API error: 503 - {"error":"overloaded"}',
    });
  });

  it('rejects a dimension mismatch instead of padding', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse({ data: [{ embedding: [1, 2] }] }));
    const provider = new ApiEmbeddingProvider(settings);

    await expect(provider.embed('hello')).rejects.toThrow(
      'Embedding dimension mismatch: expected 3, got 2'
    );
  });

  it('rejects a malformed response body', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse({ data: [] }));
    const provider = new ApiEmbeddingProvider(settings);

    await expect(provider.embed('hello')).rejects.toBeInstanceOf(EmbeddingError);
  });

  it('wraps network failures and keeps the cause', async () => {
    const networkError = new Error('connect ECONNREFUSED');
    mockFetch.mockRejectedValueOnce(networkError);
    const provider = new ApiEmbeddingProvider(settings);

    const error = await provider.embed('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      message: 'Embedding request failed: connect ECONNREFUSED',
      cause: networkError,
    });
  });

  it('times out as an EmbeddingError', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);
    const provider = new ApiEmbeddingProvider({ ...settings, timeout_ms: 10 });

    await expect(provider.embed('hello')).rejects.toThrow('Embedding request timeout after 10ms');
  });

  it('rejects with the caller abort reason', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);
    const provider = new ApiEmbeddingProvider(settings);
    const controller = new AbortController();
    const reason = new Error('cancelled by caller');

    const pending = provider.embed('hello', controller.signal);
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it('does not call fetch when the signal is already aborted', async () => {
    const provider = new ApiEmbeddingProvider(settings);
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(provider.embed('hello', controller.signal)).rejects.toThrow('too late');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('validateEmbedding', () => {
  it('rejects non-finite values', () => {
    expect(() => validateEmbedding([1, Number.NaN, 0], 3)).toThrow(
      'Embedding contains NaN or Infinity values'
    );
  });

  it('accepts a vector of the expected size', () => {
    expect(() => validateEmbedding([0, 0, 1], 3)).not.toThrow();
  });
});

describe('cosineSimilarity', () => {
  it('returns 1 for identical directions', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('returns 0 for orthogonal vectors and for zero vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity(zeroVector(2), [1, 1])).toBe(0);
  });

  it('throws on length mismatch', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have same length');
  });
});

describe('HashingEmbeddingProvider', () => {
  it('returns a zero vector for text without terms', async () => {
    const provider = new HashingEmbeddingProvider(4);
    expect(await provider.embed('a b')).toEqual([0, 0, 0, 0]);
  });

  it('returns deterministic unit vectors', async () => {
    const provider = new HashingEmbeddingProvider(32);
    const first = await provider.embed('green tea in the morning');
    const second = await provider.embed('green tea in the morning');

    expect(first).toEqual(second);
    expect(first).toHaveLength(32);
    expect(Math.sqrt(first.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 10);
  });

  it('rejects invalid dimensions', () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow('positive integer');
  });
});
