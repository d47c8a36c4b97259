import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { ShortTermMemory } from './short-term.js';
import { InMemoryEphemeralBackend } from './ephemeral.js';
import { BackendError, ValidationError } from '../errors.js';
import { logWarn } from '../fault-logger.js';

vi.mock('../fault-logger.js', () => ({
  logError: vi.fn(),
  logWarn: vi.fn(),
  logInfo: vi.fn(),
}));

describe('ShortTermMemory', () => {
  let backend: InMemoryEphemeralBackend;

  beforeEach(() => {
    backend = new InMemoryEphemeralBackend();
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('round-trips JSON values', async () => {
    const stm = new ShortTermMemory(backend);

    await stm.put('session-1', { turn: 3, topics: ['tea'] });

    expect(await stm.get('session-1')).toEqual({ turn: 3, topics: ['tea'] });
  });

  it('returns undefined for a missing key', async () => {
    expect(await new ShortTermMemory(backend).get('nope')).toBeUndefined();
  });

  it('writes under the key prefix with the store-wide TTL', async () => {
    const setex = vi.spyOn(backend, 'setex');
    const stm = new ShortTermMemory(backend, { ttlSeconds: 30, keyPrefix: 'agent:' });

    await stm.put('k', 'v');

    expect(setex).toHaveBeenCalledWith('agent:k', 30, '"v"');
  });

  it('defaults to a 60 second TTL and the mnemos prefix', async () => {
    const setex = vi.spyOn(backend, 'setex');
    const stm = new ShortTermMemory(backend);

    await stm.put('k', 1);

    expect(stm.ttlSeconds).toBe(60);
    expect(setex).toHaveBeenCalledWith('mnemos:stm:k', 60, '1');
  });

  it('expires entries after the TTL', async () => {
    vi.useFakeTimers();
    const stm = new ShortTermMemory(backend, { ttlSeconds: 1 });

    await stm.put('k', 'v');
    expect(await stm.get('k')).toBe('v');

    vi.advanceTimersByTime(999);
    expect(await stm.get('k')).toBe('v');

    vi.advanceTimersByTime(2);
    expect(await stm.get('k')).toBeUndefined();
  });

  it('rejects a non-positive or fractional TTL', () => {
    expect(() => new ShortTermMemory(backend, { ttlSeconds: 0 })).toThrow(ValidationError);
    expect(() => new ShortTermMemory(backend, { ttlSeconds: 1.5 })).toThrow(ValidationError);
  });

  it('rejects values that cannot be serialized', async () => {
    const stm = new ShortTermMemory(backend);
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    await expect(stm.put('k', circular)).rejects.toBeInstanceOf(ValidationError);
    await expect(stm.put('k', undefined)).rejects.toThrow('Value for k is not JSON-serializable');
  });

  it('drops a corrupted entry and reports a miss', async () => {
    const stm = new ShortTermMemory(backend);
    await backend.setex('mnemos:stm:k', 60, '{not json');

    expect(await stm.get('k')).toBeUndefined();
    expect(await backend.get('mnemos:stm:k')).toBeUndefined();
    expect(logWarn).toHaveBeenCalledWith('short-term', 'Dropping corrupted entry k', { key: 'k' });
  });

  it('validates reads against a schema', async () => {
    const stm = new ShortTermMemory(backend);
    const schema = z.object({ turn: z.number() });

    await stm.put('good', { turn: 2 });
    await stm.put('bad', { turn: 'two' });

    expect(await stm.getParsed('good', schema)).toEqual({ turn: 2 });
    expect(await stm.getParsed('missing', schema)).toBeUndefined();
    await expect(stm.getParsed('bad', schema)).rejects.toBeInstanceOf(ValidationError);
  });

  it('deletes entries', async () => {
    const stm = new ShortTermMemory(backend);
    await stm.put('k', 'v');

    await stm.delete('k');

    expect(await stm.get('k')).toBeUndefined();
  });

  it('wraps backend failures in BackendError', async () => {
    const cause = new Error('ECONNRESET');
    vi.spyOn(backend, 'get').mockRejectedValueOnce(cause);
    const stm = new ShortTermMemory(backend);

    const error = await stm.get('k').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({
      message: 'Short-term get failed for k: ECONNRESET',
      context: { category: 'short_term', operation: 'get', key: 'k' },
      cause,
    });
  });
});
