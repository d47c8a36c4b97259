/**
 * Configuration system for mnemos
 *
 * Layers, lowest first:
 *   defaults (config-defaults.ts)
 *   global config   ~/.mnemos/config.json
 *   project config  ./.mnemos/config.json
 *   environment     QDRANT_URL, QDRANT_API_KEY, REDIS_URL, MNEMOS_EMBEDDING_*
 *   override        setConfigOverride() (tests, CLI flags)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { validateConfig } from './config-validation.js';
import { DEFAULT_CONFIG } from './config-defaults.js';
import { logWarn } from './fault-logger.js';
import type { MnemosConfig, PartialMnemosConfig, ErrorReportingConfig } from './config-types.js';

export type {
  Distance,
  SortScope,
  FaultLevel,
  MnemosConfig,
  PartialMnemosConfig,
  QdrantSettings,
  EmbeddingSettings,
  RetrievalSettings,
  ShortTermSettings,
  ErrorReportingConfig,
} from './config-types.js';

export { DEFAULT_CONFIG } from './config-defaults.js';

// ============================================================================
// Paths
// ============================================================================

export function getGlobalConfigPath(): string {
  const dir = process.env.MNEMOS_HOME || path.join(os.homedir(), '.mnemos');
  return path.join(dir, 'config.json');
}

export function getProjectConfigPath(): string {
  return path.join(process.cwd(), '.mnemos', 'config.json');
}

// ============================================================================
// Layer merging
// ============================================================================

/**
 * Merge a partial layer over a full config, section by section.
 * Validated layers never carry `undefined` values, so spreading is safe.
 */
export function mergeConfig(base: MnemosConfig, layer: PartialMnemosConfig): MnemosConfig {
  return {
    qdrant: { ...base.qdrant, ...layer.qdrant },
    embeddings: { ...base.embeddings, ...layer.embeddings },
    retrieval: { ...base.retrieval, ...layer.retrieval },
    short_term: { ...base.short_term, ...layer.short_term },
    error_reporting: { ...base.error_reporting, ...layer.error_reporting },
  };
}

/** Environment overrides. Only variables that are set produce keys. */
export function readEnvLayer(env: NodeJS.ProcessEnv = process.env): PartialMnemosConfig {
  const layer: PartialMnemosConfig = {};

  const qdrant: PartialMnemosConfig['qdrant'] = {};
  if (env.QDRANT_URL) qdrant.url = env.QDRANT_URL;
  if (env.QDRANT_API_KEY) qdrant.api_key = env.QDRANT_API_KEY;
  if (env.MNEMOS_COLLECTION_PREFIX) qdrant.collection_prefix = env.MNEMOS_COLLECTION_PREFIX;
  if (Object.keys(qdrant).length > 0) layer.qdrant = qdrant;

  const embeddings: PartialMnemosConfig['embeddings'] = {};
  if (env.MNEMOS_EMBEDDING_URL) embeddings.api_url = env.MNEMOS_EMBEDDING_URL;
  if (env.MNEMOS_EMBEDDING_KEY) embeddings.api_key = env.MNEMOS_EMBEDDING_KEY;
  if (env.MNEMOS_EMBEDDING_MODEL) embeddings.model = env.MNEMOS_EMBEDDING_MODEL;
  if (env.MNEMOS_EMBEDDING_DIMENSIONS) {
    const dims = Number.parseInt(env.MNEMOS_EMBEDDING_DIMENSIONS, 10);
    if (Number.isInteger(dims) && dims > 0) embeddings.dimensions = dims;
  }
  if (Object.keys(embeddings).length > 0) layer.embeddings = embeddings;

  if (env.REDIS_URL) layer.short_term = { redis_url: env.REDIS_URL };

  return layer;
}

// ============================================================================
// Loading
// ============================================================================

// Config cache: avoids re-reading files on every getConfig() call
let configCache: {
  fileConfig: MnemosConfig;
  globalMtime: number;
  projectMtime: number;
} | null = null;

let configOverride: PartialMnemosConfig | null = null;

/** Invalidate config cache (for tests or after config changes) */
export function invalidateConfigCache(): void {
  configCache = null;
}

/** Temporary override applied on top of every other layer. Pass null to clear. */
export function setConfigOverride(override: PartialMnemosConfig | null): void {
  configOverride = override;
}

function getFileMtime(filePath: string): number {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return 0;
  }
}

function readLayer(filePath: string, issues: string[]): PartialMnemosConfig {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    issues.push(`Could not parse ${filePath}: ${message}`);
    return {};
  }

  const result = validateConfig(raw);
  for (const issue of result.issues) {
    issues.push(`${filePath}: ${issue}`);
  }
  return result.config;
}

export function getConfig(): MnemosConfig {
  const globalPath = getGlobalConfigPath();
  const projectPath = getProjectConfigPath();
  const globalMtime = getFileMtime(globalPath);
  const projectMtime = getFileMtime(projectPath);

  const issues: string[] = [];
  if (
    !configCache ||
    configCache.globalMtime !== globalMtime ||
    configCache.projectMtime !== projectMtime
  ) {
    let fileConfig = mergeConfig(DEFAULT_CONFIG, readLayer(globalPath, issues));
    fileConfig = mergeConfig(fileConfig, readLayer(projectPath, issues));
    configCache = { fileConfig, globalMtime, projectMtime };
  }

  let config = mergeConfig(configCache.fileConfig, readEnvLayer());
  if (configOverride) {
    config = mergeConfig(config, configOverride);
  }

  // Logged after the cache is populated: the fault logger reads config too.
  for (const issue of issues) {
    logWarn('config', issue);
  }

  return config;
}

export function getErrorReportingConfig(): ErrorReportingConfig {
  return getConfig().error_reporting;
}
