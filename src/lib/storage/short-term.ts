/**
 * Short-term memory: JSON values under a store-wide TTL.
 * No search, no embeddings. Expiry is left to the backend.
 */

import type { z } from 'zod';
import { BackendError, ValidationError, errorMessage, isMnemosError } from '../errors.js';
import { logError, logWarn } from '../fault-logger.js';
import type { EphemeralBackend } from './ephemeral.js';

export const DEFAULT_TTL_SECONDS = 60;
export const DEFAULT_KEY_PREFIX = 'mnemos:stm:';

export interface ShortTermMemoryOptions {
  ttlSeconds?: number;
  keyPrefix?: string;
}

export class ShortTermMemory {
  readonly ttlSeconds: number;
  private readonly keyPrefix: string;

  constructor(
    private readonly backend: EphemeralBackend,
    options: ShortTermMemoryOptions = {}
  ) {
    const ttl = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    if (!Number.isInteger(ttl) || ttl < 1) {
      throw new ValidationError(`TTL must be a positive whole number of seconds, got ${ttl}`, {
        category: 'short_term',
        operation: 'construct',
      });
    }
    this.ttlSeconds = ttl;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  private makeKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isMnemosError(error)) throw error;
      const context = { category: 'short_term', operation, key };
      logError('short-term', `${operation} failed for ${key}`, error, context);
      throw new BackendError(`Short-term ${operation} failed for ${key}: ${errorMessage(error)}`, context, {
        cause: error,
      });
    }
  }

  async put(key: string, value: unknown): Promise<void> {
    let data: string | undefined;
    try {
      data = JSON.stringify(value);
    } catch (error) {
      throw new ValidationError(`Value for ${key} is not JSON-serializable: ${errorMessage(error)}`, {
        category: 'short_term',
        operation: 'put',
        key,
      });
    }
    if (data === undefined) {
      throw new ValidationError(`Value for ${key} is not JSON-serializable`, {
        category: 'short_term',
        operation: 'put',
        key,
      });
    }
    const serialized = data;

    await this.run('put', key, () => this.backend.setex(this.makeKey(key), this.ttlSeconds, serialized));
  }

  /** Stored value, or undefined when missing or expired. */
  async get(key: string): Promise<unknown> {
    return this.run('get', key, async () => {
      const data = await this.backend.get(this.makeKey(key));
      if (data === undefined) return undefined;

      try {
        return JSON.parse(data);
      } catch {
        // Corrupted entry: drop it and report a miss
        logWarn('short-term', `Dropping corrupted entry ${key}`, { key });
        await this.backend.del(this.makeKey(key));
        return undefined;
      }
    });
  }

  /** Like get(), validated against `schema`. A stored value of the wrong shape is a ValidationError. */
  async getParsed<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | undefined> {
    const value = await this.get(key);
    if (value === undefined) return undefined;

    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ValidationError(
        `Stored value for ${key} does not match the expected shape: ${result.error.issues[0]?.message ?? 'invalid'}`,
        { category: 'short_term', operation: 'getParsed', key }
      );
    }
    return result.data;
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', key, () => this.backend.del(this.makeKey(key)));
  }

  async close(): Promise<void> {
    await this.backend.close?.();
  }
}
