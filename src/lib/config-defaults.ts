/**
 * Default configuration values for mnemos
 */

import type {
  MnemosConfig,
  ErrorReportingConfig,
  RetrievalSettings,
  ShortTermSettings,
} from './config-types.js';

const DEFAULT_QDRANT_URL = 'http://localhost:6333';
const DEFAULT_REDIS_URL = 'redis://localhost:6379';
const DEFAULT_EMBEDDING_API_URL = 'http://localhost:11434/v1/embeddings';
const DEFAULT_EMBEDDING_MODEL = 'all-minilm'; // 384 dimensions

const DEFAULT_RETRIEVAL_CONFIG: RetrievalSettings = {
  rrf_k: 60,
  max_candidates: 1000,
  default_limit: 100,
  sort_scope: 'global',
};

const DEFAULT_SHORT_TERM_CONFIG: ShortTermSettings = {
  redis_url: DEFAULT_REDIS_URL,
  ttl_seconds: 60,
  key_prefix: 'mnemos:stm:',
};

const DEFAULT_ERROR_REPORTING_CONFIG: ErrorReportingConfig = {
  enabled: true,
  level: 'warn',
  max_file_size_mb: 10,
};

export const DEFAULT_CONFIG: MnemosConfig = {
  qdrant: {
    url: DEFAULT_QDRANT_URL,
    collection_prefix: 'mnemos',
    distance: 'Cosine',
  },
  embeddings: {
    api_url: DEFAULT_EMBEDDING_API_URL,
    model: DEFAULT_EMBEDDING_MODEL,
    dimensions: 384,
    timeout_ms: 30000,
  },
  retrieval: DEFAULT_RETRIEVAL_CONFIG,
  short_term: DEFAULT_SHORT_TERM_CONFIG,
  error_reporting: DEFAULT_ERROR_REPORTING_CONFIG,
};
