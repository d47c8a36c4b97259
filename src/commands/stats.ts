/**
 * Topic and per-user statistics for a category.
 */

import { parseCategory, parsePositiveInt, printJson, withSystem } from './shared.js';

interface TopicsOptions {
  category?: string;
  json?: boolean;
}

interface StatsOptions extends TopicsOptions {
  limit?: string;
  page?: string;
}

export async function topics(options: TopicsOptions = {}): Promise<void> {
  const category = parseCategory(options.category);
  const all = await withSystem((system) => system.store(category).getAllTopics());

  if (options.json) {
    printJson(all);
    return;
  }
  if (all.length === 0) {
    console.log(`No topics in ${category}.`);
    return;
  }
  for (const topic of all) console.log(topic);
}

export async function stats(options: StatsOptions = {}): Promise<void> {
  const category = parseCategory(options.category);
  const limit = parsePositiveInt(options.limit, 'limit');
  const page = parsePositiveInt(options.page, 'page');

  const result = await withSystem((system) => system.store(category).getUserMemoryStats({ limit, page }));

  if (options.json) {
    printJson(result);
    return;
  }

  console.log(`## ${category} (${result.total} users)`);
  for (const row of result.stats) {
    console.log(`  ${row.user_id}: ${row.total_memories} memories, last updated ${row.last_memory_updated_at}`);
  }
}
