import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  DEFAULT_CONFIG,
  getConfig,
  getGlobalConfigPath,
  getProjectConfigPath,
  invalidateConfigCache,
  mergeConfig,
  readEnvLayer,
  setConfigOverride,
} from './config.js';
import { validateConfig } from './config-validation.js';
import { logWarn } from './fault-logger.js';

vi.mock('./fault-logger.js', () => ({
  logWarn: vi.fn(),
}));

const testRoot = '/tmp/mnemos-test-config';
const homeDir = path.join(testRoot, 'home');
const projectDir = path.join(testRoot, 'project');

const ENV_KEYS = [
  'QDRANT_URL',
  'QDRANT_API_KEY',
  'REDIS_URL',
  'MNEMOS_COLLECTION_PREFIX',
  'MNEMOS_EMBEDDING_URL',
  'MNEMOS_EMBEDDING_KEY',
  'MNEMOS_EMBEDDING_MODEL',
  'MNEMOS_EMBEDDING_DIMENSIONS',
];

function writeJson(file: string, value: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value));
}

describe('Config Module', () => {
  beforeEach(() => {
    fs.rmSync(testRoot, { recursive: true, force: true });
    fs.mkdirSync(homeDir, { recursive: true });
    fs.mkdirSync(projectDir, { recursive: true });

    vi.stubEnv('MNEMOS_HOME', homeDir);
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
    vi.spyOn(process, 'cwd').mockReturnValue(projectDir);

    invalidateConfigCache();
    vi.mocked(logWarn).mockClear();
  });

  afterEach(() => {
    setConfigOverride(null);
    invalidateConfigCache();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(testRoot, { recursive: true, force: true });
  });

  describe('paths', () => {
    it('reads the global config from MNEMOS_HOME', () => {
      expect(getGlobalConfigPath()).toBe(path.join(homeDir, 'config.json'));
    });

    it('reads the project config from ./.mnemos', () => {
      expect(getProjectConfigPath()).toBe(path.join(projectDir, '.mnemos', 'config.json'));
    });
  });

  describe('getConfig', () => {
    it('returns defaults when no config files exist', () => {
      expect(getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('layers project config over global config over defaults', () => {
      writeJson(getGlobalConfigPath(), {
        qdrant: { collection_prefix: 'global' },
        retrieval: { rrf_k: 30 },
      });
      writeJson(getProjectConfigPath(), { qdrant: { collection_prefix: 'project' } });

      const config = getConfig();

      expect(config.qdrant.collection_prefix).toBe('project');
      expect(config.qdrant.distance).toBe('Cosine');
      expect(config.retrieval).toEqual({ ...DEFAULT_CONFIG.retrieval, rrf_k: 30 });
    });

    it('applies environment variables over files', () => {
      writeJson(getProjectConfigPath(), { qdrant: { url: 'http://file.test.local:6333' } });
      vi.stubEnv('QDRANT_URL', 'http://env.test.local:6333');
      vi.stubEnv('REDIS_URL', 'redis://env.test.local:6379');
      vi.stubEnv('MNEMOS_EMBEDDING_DIMENSIONS', '768');

      const config = getConfig();

      expect(config.qdrant.url).toBe('http://env.test.local:6333');
      expect(config.short_term.redis_url).toBe('redis://env.test.local:6379');
      expect(config.embeddings.dimensions).toBe(768);
    });

    it('drops an invalid section and warns once per issue', () => {
      writeJson(getProjectConfigPath(), {
        retrieval: { rrf_k: -1 },
        short_term: { ttl_seconds: 5 },
      });

      const config = getConfig();

      expect(config.retrieval).toEqual(DEFAULT_CONFIG.retrieval);
      expect(config.short_term.ttl_seconds).toBe(5);
      expect(logWarn).toHaveBeenCalledOnce();
      expect(logWarn).toHaveBeenCalledWith(
        'config',
        `${getProjectConfigPath()}: Invalid config value at "retrieval.rrf_k": Number must be greater than 0`
      );
    });

    it('warns about a file that is not JSON and keeps defaults', () => {
      fs.mkdirSync(path.dirname(getProjectConfigPath()), { recursive: true });
      fs.writeFileSync(getProjectConfigPath(), '{ not json');

      expect(getConfig()).toEqual(DEFAULT_CONFIG);
      expect(logWarn).toHaveBeenCalledWith('config', expect.stringContaining(`Could not parse ${getProjectConfigPath()}`));
    });

    it('re-reads a file whose mtime changed', () => {
      const file = getProjectConfigPath();
      writeJson(file, { retrieval: { default_limit: 5 } });
      expect(getConfig().retrieval.default_limit).toBe(5);

      writeJson(file, { retrieval: { default_limit: 7 } });
      const later = new Date(Date.now() + 60_000);
      fs.utimesSync(file, later, later);

      expect(getConfig().retrieval.default_limit).toBe(7);
    });
  });

  describe('setConfigOverride', () => {
    it('applies the override on top of every layer', () => {
      vi.stubEnv('QDRANT_URL', 'http://env.test.local:6333');
      setConfigOverride({ qdrant: { url: 'http://override.test.local:6333' }, short_term: { ttl_seconds: 5 } });

      const config = getConfig();

      expect(config.qdrant.url).toBe('http://override.test.local:6333');
      expect(config.short_term.ttl_seconds).toBe(5);
    });

    it('clears the override when set to null', () => {
      setConfigOverride({ short_term: { ttl_seconds: 5 } });
      setConfigOverride(null);

      expect(getConfig().short_term.ttl_seconds).toBe(60);
    });
  });

  describe('readEnvLayer', () => {
    it('only produces keys for variables that are set', () => {
      expect(readEnvLayer({})).toEqual({});
      expect(
        readEnvLayer({ MNEMOS_EMBEDDING_MODEL: 'nomic-embed-text', MNEMOS_EMBEDDING_KEY: 'test-secret' })
      ).toEqual({ embeddings: { model: 'nomic-embed-text', api_key: 'test-secret' } });
    });

    it('ignores a dimension count that is not a positive integer', () => {
      expect(readEnvLayer({ MNEMOS_EMBEDDING_DIMENSIONS: 'abc' })).toEqual({});
      expect(readEnvLayer({ MNEMOS_EMBEDDING_DIMENSIONS: '0' })).toEqual({});
    });
  });

  describe('mergeConfig', () => {
    it('merges section by section', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { embeddings: { dimensions: 768 } });

      expect(merged.embeddings).toEqual({ ...DEFAULT_CONFIG.embeddings, dimensions: 768 });
      expect(merged.qdrant).toEqual(DEFAULT_CONFIG.qdrant);
    });
  });

  describe('validateConfig', () => {
    it('rejects a file that is not an object', () => {
      expect(validateConfig([1, 2])).toEqual({ config: {}, issues: ['Config file must contain a JSON object'] });
    });

    it('reports every issue of an invalid section', () => {
      const result = validateConfig({ qdrant: { distance: 'Hamming', collection_prefix: 'has space' } });

      expect(result.config.qdrant).toBeUndefined();
      expect(result.issues).toHaveLength(2);
      expect(result.issues[0]).toBe(
        'Invalid config value at "qdrant.collection_prefix": collection prefix may only contain letters, digits, "_" and "-"'
      );
    });

    it('accepts every section', () => {
      const result = validateConfig({
        qdrant: { url: 'http://qdrant.test.local:6333', distance: 'Dot' },
        embeddings: { model: 'all-minilm', dimensions: 384 },
        retrieval: { sort_scope: 'page' },
        short_term: { key_prefix: 'bot:' },
        error_reporting: { level: 'debug', webhook_headers: { 'X-Token': 'test-secret' } },
      });

      expect(result.issues).toEqual([]);
      expect(result.config.retrieval).toEqual({ sort_scope: 'page' });
      expect(result.config.error_reporting).toEqual({ level: 'debug', webhook_headers: { 'X-Token': 'test-secret' } });
    });
  });
});
