/**
 * Helpers shared by CLI commands: opening the memory system and parsing
 * option strings.
 */

import { getConfig } from '../lib/config.js';
import { ValidationError, errorMessage, isMnemosError } from '../lib/errors.js';
import { createMemorySystem, type MemorySystem } from '../lib/public-api.js';
import { isMemoryCategory, MEMORY_CATEGORIES, type MemoryCategory } from '../lib/storage/types.js';

export function openSystem(): MemorySystem {
  return createMemorySystem(getConfig());
}

/** Run `fn` against a freshly opened system and close it afterwards. */
export async function withSystem<T>(fn: (system: MemorySystem) => Promise<T>): Promise<T> {
  const system = openSystem();
  try {
    return await fn(system);
  } finally {
    await system.close();
  }
}

export function parseCategory(value: string | undefined): MemoryCategory {
  if (value === undefined) return 'memories';
  if (!isMemoryCategory(value)) {
    throw new ValidationError(`Unknown category "${value}" (expected ${MEMORY_CATEGORIES.join(', ')})`, {
      operation: 'parseCategory',
    });
  }
  return value;
}

export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`--${name} must be a positive integer, got "${value}"`, { operation: 'parseOption' });
  }
  return parsed;
}

/** Comma-separated list; blanks dropped. */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** `code: message` for MnemosErrors, `ERROR: message` for anything else. */
export function formatCliError(error: unknown): string {
  if (isMnemosError(error)) return `${error.code}: ${error.message}`;
  return `ERROR: ${errorMessage(error)}`;
}

/** Wrap a command action: errors are printed and set exit code 1. */
export function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(formatCliError(error));
      process.exitCode = 1;
    }
  };
}
