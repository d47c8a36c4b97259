/**
 * Ephemeral key/value backends for short-term memory.
 *
 * Expiry belongs to the backend: Redis expires keys set with SETEX, the
 * in-process backend hides entries past their deadline.
 */

import { Redis } from 'ioredis';

export interface EphemeralBackend {
  get(key: string): Promise<string | undefined>;
  /** Set `key` to `value`, expiring after `ttlSeconds`. */
  setex(key: string, ttlSeconds: number, value: string): Promise<void>;
  del(key: string): Promise<void>;
  close?(): Promise<void>;
}

export class RedisEphemeralBackend implements EphemeralBackend {
  private readonly redis: Redis;

  constructor(url: string) {
    this.redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });
  }

  async get(key: string): Promise<string | undefined> {
    const data = await this.redis.get(key);
    return data ?? undefined;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    await this.redis.setex(key, ttlSeconds, value);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

interface Entry {
  value: string;
  expiresAt: number;
}

export class InMemoryEphemeralBackend implements EphemeralBackend {
  private entries = new Map<string, Entry>();

  async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
