import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { formatFaultLine, logFault, logError, logWarn, logInfo } from './fault-logger.js';
import type { FaultEntry } from './fault-logger.js';
import type { ErrorReportingConfig } from './config-types.js';

const testDir = '/tmp/mnemos-test-faults';
const logPath = path.join(testDir, 'faults.log');
const backupPath = logPath + '.1';

const mockConfig: ErrorReportingConfig = {
  enabled: true,
  level: 'warn',
  file_path: logPath,
  max_file_size_mb: 5,
};

vi.mock('./config.js', () => ({
  getErrorReportingConfig: () => ({ ...mockConfig }),
}));

function readEntries(file: string = logPath): FaultEntry[] {
  return fs
    .readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line): FaultEntry => JSON.parse(line));
}

const spyOnStderr = () => vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

describe('fault-logger', () => {
  let stderr: ReturnType<typeof spyOnStderr>;

  beforeEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
    fs.mkdirSync(testDir, { recursive: true });

    mockConfig.enabled = true;
    mockConfig.level = 'warn';
    mockConfig.file_path = logPath;
    mockConfig.max_file_size_mb = 5;
    mockConfig.webhook_url = undefined;
    mockConfig.webhook_headers = undefined;

    stderr = spyOnStderr();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
  });

  // -------------------------------------------------------------------------
  // stderr channel
  // -------------------------------------------------------------------------

  describe('stderr channel', () => {
    it('formats one line per entry', () => {
      expect(
        formatFaultLine({
          timestamp: '2024-01-01T00:00:00.000Z',
          level: 'warn',
          component: 'memory-store',
          message: 'upsertMemory failed on memories',
          context: { category: 'memories' },
        })
      ).toBe('[mnemos] WARN memory-store: upsertMemory failed on memories {"category":"memories"}\n');
    });

    it('omits an empty context', () => {
      expect(
        formatFaultLine({ timestamp: '', level: 'error', component: 'config', message: 'bad', context: {} })
      ).toBe('[mnemos] ERROR config: bad\n');
    });

    it('writes every logged entry', () => {
      logError('collections', 'create failed');
      expect(stderr).toHaveBeenCalledWith('[mnemos] ERROR collections: create failed\n');
    });

    it('writes when no file is configured', () => {
      mockConfig.file_path = undefined;
      logWarn('short-term', 'dropped');
      expect(stderr).toHaveBeenCalledWith('[mnemos] WARN short-term: dropped\n');
      expect(fs.existsSync(logPath)).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // Local file channel
  // -------------------------------------------------------------------------

  describe('local file channel', () => {
    it('writes a JSON line', () => {
      logFault('error', 'test', 'something broke');
      const [entry] = readEntries();
      expect(entry.level).toBe('error');
      expect(entry.component).toBe('test');
      expect(entry.message).toBe('something broke');
      expect(entry.timestamp).toBeTruthy();
    });

    it('includes stack trace from Error', () => {
      logFault('error', 'test', 'crash', { error: new Error('boom') });
      expect(readEntries()[0].stack).toContain('Error: boom');
    });

    it('includes context object', () => {
      logFault('error', 'retrieval', 'failed', { context: { category: 'knowledge', operation: 'listMemories' } });
      expect(readEntries()[0].context).toEqual({ category: 'knowledge', operation: 'listMemories' });
    });

    it('creates the directory if missing', () => {
      fs.rmSync(testDir, { recursive: true });
      logFault('error', 'test', 'no dir');
      expect(fs.existsSync(logPath)).toBe(true);
    });

    it('skips debug and info when level=warn', () => {
      logFault('debug', 'test', 'debug msg');
      logFault('info', 'test', 'info msg');
      expect(fs.existsSync(logPath)).toBe(false);
      expect(stderr).not.toHaveBeenCalled();
    });

    it('respects enabled=false', () => {
      mockConfig.enabled = false;
      logFault('error', 'test', 'should not log');
      expect(fs.existsSync(logPath)).toBe(false);
    });

    it('appends multiple entries as JSON lines', () => {
      logFault('error', 'a', 'first');
      logFault('warn', 'b', 'second');
      expect(readEntries().map((e) => e.message)).toEqual(['first', 'second']);
    });
  });

  // -------------------------------------------------------------------------
  // Rotation
  // -------------------------------------------------------------------------

  describe('rotation', () => {
    it('rotates when file exceeds max size', () => {
      mockConfig.max_file_size_mb = 0.0001; // ~100 bytes
      logFault('error', 'test', 'a'.repeat(200));
      logFault('error', 'test', 'after rotation');

      expect(fs.existsSync(backupPath)).toBe(true);
      expect(readEntries().map((e) => e.message)).toEqual(['after rotation']);
    });

    it('overwrites .1 backup on second rotation', () => {
      mockConfig.max_file_size_mb = 0.0001;
      logFault('error', 'test', 'a'.repeat(200));
      logFault('error', 'test', 'b'.repeat(200));
      logFault('error', 'test', 'final');

      expect(readEntries(backupPath).map((e) => e.message)).toEqual(['b'.repeat(200)]);
    });
  });

  // -------------------------------------------------------------------------
  // Webhook channel
  // -------------------------------------------------------------------------

  describe('webhook channel', () => {
    it('POSTs the entry to the webhook URL', () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response());
      mockConfig.webhook_url = 'https://hooks.test.local/faults';

      logFault('error', 'test', 'webhook test');

      expect(fetchSpy).toHaveBeenCalledOnce();
      const [url, opts] = fetchSpy.mock.calls[0];
      expect(url).toBe('https://hooks.test.local/faults');
      expect(opts?.method).toBe('POST');
      expect(JSON.parse(String(opts?.body))).toMatchObject({ level: 'error', message: 'webhook test' });
    });

    it('sends custom headers', () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response());
      mockConfig.webhook_url = 'https://hooks.test.local/faults';
      mockConfig.webhook_headers = { Authorization: 'Bearer test-secret' };

      logFault('error', 'test', 'with auth');

      const [, opts] = fetchSpy.mock.calls[0];
      expect(opts?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    });

    it('does not call fetch when no webhook_url', () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch');
      logFault('error', 'test', 'no webhook');
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('reports a failed delivery on stderr without throwing', async () => {
      vi.spyOn(globalThis, 'fetch').mockRejectedValue(new Error('network down'));
      mockConfig.webhook_url = 'https://hooks.test.local/faults';

      expect(() => logFault('error', 'test', 'should not throw')).not.toThrow();

      await vi.waitFor(() => {
        expect(stderr).toHaveBeenCalledWith('[mnemos] fault-logger webhook channel failed: network down\n');
      });
    });
  });

  // -------------------------------------------------------------------------
  // Convenience wrappers
  // -------------------------------------------------------------------------

  describe('convenience wrappers', () => {
    it('logError includes error and context', () => {
      logError('memory-store', 'upsert failed', new Error('oops'), { category: 'memories' });
      const [entry] = readEntries();
      expect(entry.level).toBe('error');
      expect(entry.stack).toContain('Error: oops');
      expect(entry.context).toEqual({ category: 'memories' });
    });

    it('logWarn logs at warn level', () => {
      logWarn('config', 'bad value');
      expect(readEntries()[0]).toMatchObject({ level: 'warn', component: 'config' });
    });

    it('logInfo logs at info level when level=info', () => {
      mockConfig.level = 'info';
      logInfo('collections', 'created');
      logFault('debug', 'collections', 'filtered');
      expect(readEntries().map((e) => e.level)).toEqual(['info']);
    });

    it('logs debug entries when level=debug', () => {
      mockConfig.level = 'debug';
      logFault('debug', 'retrieval', 'fused');
      expect(readEntries()[0].level).toBe('debug');
    });
  });
});
