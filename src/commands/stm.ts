import { printJson, withSystem } from './shared.js';

/**
 * Store a value in short-term memory. Text that isn't valid JSON is stored as a string.
 */
export async function stmSet(key: string, value: string): Promise<void> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    parsed = value;
  }

  const ttl = await withSystem(async (system) => {
    await system.shortTerm.put(key, parsed);
    return system.shortTerm.ttlSeconds;
  });
  console.log(`Stored ${key} (expires in ${ttl}s)`);
}

export async function stmGet(key: string, options: { json?: boolean } = {}): Promise<void> {
  const value = await withSystem((system) => system.shortTerm.get(key));
  if (value === undefined) {
    console.log(options.json ? 'null' : `No entry for ${key} (missing or expired).`);
    return;
  }
  printJson(value);
}
