/**
 * Type definitions for the mnemos configuration.
 *
 * Keys are snake_case to match the JSON files in ~/.mnemos and ./.mnemos.
 */

export type Distance = 'Cosine' | 'Dot' | 'Euclid' | 'Manhattan';

export type SortScope = 'global' | 'page';

export type FaultLevel = 'error' | 'warn' | 'info' | 'debug';

export interface QdrantSettings {
  /** Base URL of the Qdrant REST API */
  url?: string;
  api_key?: string;
  /** Physical collections are named `<collection_prefix>_<category>` */
  collection_prefix: string;
  distance: Distance;
  /** Client request timeout */
  timeout_ms?: number;
}

export interface EmbeddingSettings {
  /** OpenAI-compatible /embeddings endpoint (OpenAI, OpenRouter, Ollama, llama.cpp, LM Studio) */
  api_url: string;
  api_key?: string;
  model: string;
  /** Dense dimensionality D. Fixed per deployment; changing it needs a new collection prefix. */
  dimensions: number;
  timeout_ms: number;
}

export interface RetrievalSettings {
  /** Reciprocal Rank Fusion constant */
  rrf_k: number;
  /** Depth of each ranked list: min(matching records, max_candidates) */
  max_candidates: number;
  default_limit: number;
  /** 'global' sorts before pagination, 'page' sorts only the returned page */
  sort_scope: SortScope;
}

export interface ShortTermSettings {
  redis_url: string;
  ttl_seconds: number;
  key_prefix: string;
}

export interface ErrorReportingConfig {
  enabled: boolean;
  level: FaultLevel;
  /** JSON-lines fault log. Unset = stderr only. */
  file_path?: string;
  max_file_size_mb: number;
  webhook_url?: string;
  webhook_headers?: Record<string, string>;
}

export interface MnemosConfig {
  qdrant: QdrantSettings;
  embeddings: EmbeddingSettings;
  retrieval: RetrievalSettings;
  short_term: ShortTermSettings;
  error_reporting: ErrorReportingConfig;
}

/** Shape of a config file: every section and key optional. */
export type PartialMnemosConfig = {
  [K in keyof MnemosConfig]?: Partial<MnemosConfig[K]>;
};
