import { ValidationError } from '../lib/errors.js';
import { parseSortField } from '../lib/storage/retrieval.js';
import type { MemoryInput, SearchMode, SortOrder, StoredMemory } from '../lib/storage/types.js';
import { parseCategory, parseList, parsePositiveInt, printJson, withSystem } from './shared.js';

interface TenantOptions {
  user?: string;
  agent?: string;
  team?: string;
}

interface CategoryOptions {
  category?: string;
  json?: boolean;
}

export interface RememberOptions extends TenantOptions, CategoryOptions {
  id?: string;
  topics?: string;
  input?: string;
}

export interface MemoriesOptions extends TenantOptions, CategoryOptions {
  topics?: string;
  query?: string;
  mode?: string;
  limit?: string;
  page?: string;
  sort?: string;
  order?: string;
}

const SEARCH_MODES: readonly SearchMode[] = ['hybrid', 'dense', 'sparse'];

function parseMode(value: string | undefined): SearchMode | undefined {
  if (value === undefined) return undefined;
  const mode = SEARCH_MODES.find((m) => m === value);
  if (!mode) {
    throw new ValidationError(`--mode must be one of ${SEARCH_MODES.join(', ')}, got "${value}"`, {
      operation: 'parseOption',
    });
  }
  return mode;
}

function parseOrder(value: string | undefined): SortOrder | undefined {
  if (value === undefined) return undefined;
  if (value !== 'asc' && value !== 'desc') {
    throw new ValidationError(`--order must be asc or desc, got "${value}"`, { operation: 'parseOption' });
  }
  return value;
}

/** One-line summary of a record for list output. */
export function formatMemoryLine(memory: StoredMemory): string {
  const owner = [memory.user_id, memory.agent_id, memory.team_id].filter(Boolean).join('/');
  const topics = memory.topics.length > 0 ? ` [${memory.topics.join(', ')}]` : '';
  const score = memory.score !== undefined ? ` (${memory.score.toFixed(4)})` : '';
  const preview = memory.content.length > 80 ? `${memory.content.slice(0, 77)}...` : memory.content;
  return `${memory.memory_id}${owner ? ` <${owner}>` : ''}${topics}${score}: ${preview}`;
}

/**
 * Save a memory
 */
export async function remember(content: string, options: RememberOptions = {}): Promise<void> {
  const category = parseCategory(options.category);
  const input: MemoryInput = { content };
  if (options.id !== undefined) input.memory_id = options.id;
  if (options.user !== undefined) input.user_id = options.user;
  if (options.agent !== undefined) input.agent_id = options.agent;
  if (options.team !== undefined) input.team_id = options.team;
  if (options.input !== undefined) input.input = options.input;
  const topics = parseList(options.topics);
  if (topics !== undefined) input.topics = topics;

  const record = await withSystem((system) => system.store(category).upsertMemory(input));

  if (options.json) {
    printJson(record);
    return;
  }
  console.log(`Saved ${record.memory_id} to ${category}`);
}

/**
 * List or search memories
 */
export async function memories(options: MemoriesOptions = {}): Promise<void> {
  const category = parseCategory(options.category);
  const limit = parsePositiveInt(options.limit, 'limit') ?? 10;
  const page = parsePositiveInt(options.page, 'page');

  const result = await withSystem((system) =>
    system.store(category).listMemories({
      userId: options.user,
      agentId: options.agent,
      teamId: options.team,
      topics: parseList(options.topics),
      queryText: options.query,
      mode: parseMode(options.mode),
      limit,
      page,
      sortBy: options.sort !== undefined ? parseSortField(options.sort) : undefined,
      sortOrder: parseOrder(options.order),
    })
  );

  if (options.json) {
    printJson(result);
    return;
  }

  if (result.records.length === 0) {
    console.log(`No memories found in ${category}.`);
    return;
  }

  console.log(`${category}: showing ${result.records.length} of ${result.total}\n`);
  for (const memory of result.records) {
    console.log(`  ${formatMemoryLine(memory)}`);
  }
}

/**
 * Show one memory in full
 */
export async function show(memoryId: string, options: CategoryOptions = {}): Promise<void> {
  const category = parseCategory(options.category);
  const record = await withSystem((system) => system.store(category).getMemory(memoryId));

  if (!record) {
    if (options.json) {
      console.log('null');
    } else {
      console.log(`Memory ${memoryId} not found in ${category}.`);
    }
    return;
  }

  if (options.json) {
    printJson(record);
    return;
  }

  console.log(`id:       ${record.memory_id}`);
  if (record.user_id) console.log(`user:     ${record.user_id}`);
  if (record.agent_id) console.log(`agent:    ${record.agent_id}`);
  if (record.team_id) console.log(`team:     ${record.team_id}`);
  if (record.topics.length > 0) console.log(`topics:   ${record.topics.join(', ')}`);
  console.log(`updated:  ${record.updated_at}`);
  if (record.input) console.log(`input:    ${record.input}`);
  console.log(`\n${record.content}`);
}

/**
 * Delete memories by id. Missing ids are not an error.
 */
export async function forget(memoryIds: string[], options: CategoryOptions = {}): Promise<void> {
  const category = parseCategory(options.category);
  await withSystem((system) => system.store(category).deleteMemories(memoryIds));
  console.log(`Deleted ${memoryIds.length} id(s) from ${category}`);
}
