/**
 * Stable public API for mnemos integrations.
 *
 * Import via: import { ... } from 'mnemos'
 *
 * This barrel export defines the supported contract.
 * Internal module paths (dist/lib/storage/...) are NOT part of the public API.
 */

import { Bm25SparseEncoder, type SparseEncoder } from './bm25.js';
import { getConfig } from './config.js';
import type { MnemosConfig } from './config-types.js';
import { ApiEmbeddingProvider, type EmbeddingProvider } from './embeddings.js';
import { ConfigError } from './errors.js';
import { RedisEphemeralBackend, type EphemeralBackend } from './storage/ephemeral.js';
import { LongTermMemoryStore } from './storage/memory-store.js';
import { ShortTermMemory } from './storage/short-term.js';
import { MEMORY_CATEGORIES, type MemoryCategory } from './storage/types.js';
import { QdrantVectorBackend } from './storage/vector/qdrant.js';
import type { VectorBackend } from './storage/vector/interface.js';

// --- Assembly ---

/** Replacements for the components built from config. */
export interface MemorySystemOverrides {
  vectorBackend?: VectorBackend;
  ephemeralBackend?: EphemeralBackend;
  embedder?: EmbeddingProvider;
  sparseEncoder?: SparseEncoder;
  clock?: () => Date;
}

export interface MemorySystem {
  readonly config: MnemosConfig;
  readonly stores: Readonly<Record<MemoryCategory, LongTermMemoryStore>>;
  readonly shortTerm: ShortTermMemory;
  store(category: MemoryCategory): LongTermMemoryStore;
  /** Release backend connections. */
  close(): Promise<void>;
}

/**
 * Build the long-term stores (one per category) and the short-term cache.
 * The vector backend, embedding provider and sparse encoder are shared.
 */
export function createMemorySystem(
  config: MnemosConfig = getConfig(),
  overrides: MemorySystemOverrides = {}
): MemorySystem {
  const vectorBackend = overrides.vectorBackend ?? new QdrantVectorBackend({
    url: config.qdrant.url,
    apiKey: config.qdrant.api_key,
    timeout: config.qdrant.timeout_ms,
  });
  const embedder = overrides.embedder ?? new ApiEmbeddingProvider(config.embeddings);
  if (embedder.dimensions !== config.embeddings.dimensions) {
    throw new ConfigError(
      `Embedding provider produces ${embedder.dimensions} dimensions, config expects ${config.embeddings.dimensions}`,
      { operation: 'createMemorySystem' }
    );
  }
  const sparseEncoder = overrides.sparseEncoder ?? new Bm25SparseEncoder();

  const build = (category: MemoryCategory): LongTermMemoryStore =>
    new LongTermMemoryStore({
      category,
      backend: vectorBackend,
      embedder,
      sparseEncoder,
      collectionPrefix: config.qdrant.collection_prefix,
      distance: config.qdrant.distance,
      rrfK: config.retrieval.rrf_k,
      maxCandidates: config.retrieval.max_candidates,
      defaultLimit: config.retrieval.default_limit,
      sortScope: config.retrieval.sort_scope,
      clock: overrides.clock,
    });

  const stores: Record<MemoryCategory, LongTermMemoryStore> = {
    memories: build('memories'),
    sessions: build('sessions'),
    knowledge: build('knowledge'),
  };

  const ephemeralBackend = overrides.ephemeralBackend ?? new RedisEphemeralBackend(config.short_term.redis_url);
  const shortTerm = new ShortTermMemory(ephemeralBackend, {
    ttlSeconds: config.short_term.ttl_seconds,
    keyPrefix: config.short_term.key_prefix,
  });

  return {
    config,
    stores,
    shortTerm,
    store: (category) => stores[category],
    async close() {
      await Promise.all([vectorBackend.close?.(), shortTerm.close()]);
    },
  };
}

export { MEMORY_CATEGORIES };

// --- Stores ---
export { LongTermMemoryStore } from './storage/memory-store.js';
export type { MemoryRecordStore, LongTermMemoryStoreOptions, UserStatsOptions, UserStatsResult } from './storage/memory-store.js';
export { ShortTermMemory } from './storage/short-term.js';
export type { ShortTermMemoryOptions } from './storage/short-term.js';
export { isMemoryCategory, SORT_FIELDS } from './storage/types.js';
export type {
  MemoryCategory,
  MemoryRecord,
  MemoryInput,
  StoredMemory,
  ListMemoriesOptions,
  ListMemoriesResult,
  UserMemoryStats,
  OperationOptions,
  SearchMode,
  SortField,
  SortOrder,
} from './storage/types.js';

// --- Backends ---
export { QdrantVectorBackend } from './storage/vector/qdrant.js';
export { InMemoryVectorBackend } from './storage/vector/in-memory.js';
export type { VectorBackend, VectorPoint, StoredPoint, ScoredPoint } from './storage/vector/interface.js';
export { RedisEphemeralBackend, InMemoryEphemeralBackend } from './storage/ephemeral.js';
export type { EphemeralBackend } from './storage/ephemeral.js';

// --- Embeddings ---
export { ApiEmbeddingProvider, HashingEmbeddingProvider, cosineSimilarity } from './embeddings.js';
export type { EmbeddingProvider } from './embeddings.js';
export { Bm25SparseEncoder, reciprocalRankFusion } from './bm25.js';
export type { SparseEncoder } from './bm25.js';

// --- Config ---
export { getConfig, invalidateConfigCache, setConfigOverride } from './config.js';
export type { MnemosConfig, PartialMnemosConfig } from './config-types.js';

// --- Errors ---
export {
  MnemosError,
  ConfigError,
  ProvisioningError,
  BackendError,
  EmbeddingError,
  ValidationError,
  isMnemosError,
} from './errors.js';
