/**
 * Storage types for the long-term memory store.
 *
 * Record fields are snake_case: they are written verbatim into the point
 * payload, and the payload is what every backend filters and sorts on.
 */

import type { Distance, SortScope } from '../config-types.js';

export type { Distance, SortScope } from '../config-types.js';

// ============================================================================
// Categories
// ============================================================================

/** Logical record categories. Each maps to one physical collection. */
export const MEMORY_CATEGORIES = ['memories', 'sessions', 'knowledge'] as const;

export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

export function isMemoryCategory(value: string): value is MemoryCategory {
  return MEMORY_CATEGORIES.some((category) => category === value);
}

// ============================================================================
// Records
// ============================================================================

export interface MemoryRecord {
  memory_id: string;
  user_id?: string;
  agent_id?: string;
  team_id?: string;
  content: string;
  topics: string[];
  /** Source utterance the memory was extracted from */
  input?: string;
  /** ISO-8601 timestamp of the last write */
  updated_at: string;
}

/** What callers pass to upsert: id optional, timestamp always assigned by the store. */
export interface MemoryInput {
  memory_id?: string;
  user_id?: string;
  agent_id?: string;
  team_id?: string;
  content: string;
  topics?: string[];
  input?: string;
}

/** A record returned from a search. `score` is absent on metadata scrolls. */
export interface StoredMemory extends MemoryRecord {
  score?: number;
}

/** Flat payload stored next to the vectors. Absent optionals are stored as null. */
export interface MemoryPayload {
  memory_id: string;
  user_id: string | null;
  agent_id: string | null;
  team_id: string | null;
  content: string;
  topics: string[];
  input: string | null;
  updated_at: string;
}

// ============================================================================
// Vectors
// ============================================================================

export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface CollectionSchema {
  dimensions: number;
  distance: Distance;
  /** Whether the collection has a sparse vector slot */
  sparse: boolean;
}

export type PayloadIndexKind = 'keyword' | 'datetime';

// ============================================================================
// Filters
// ============================================================================

export type TenantField = 'user_id' | 'agent_id' | 'team_id';

export type FilterCondition =
  | { kind: 'equals'; field: TenantField; value: string }
  | { kind: 'matchAny'; field: 'topics'; values: string[] };

/** Conjunction of conditions. An absent filter matches everything. */
export interface Filter {
  must: FilterCondition[];
}

// ============================================================================
// Retrieval
// ============================================================================

export type SearchMode = 'hybrid' | 'dense' | 'sparse';

export const SORT_FIELDS = [
  'updated_at',
  'memory_id',
  'user_id',
  'agent_id',
  'team_id',
  'content',
] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export type SortOrder = 'asc' | 'desc';

export interface SortSpec {
  field: SortField;
  order: SortOrder;
  scope: SortScope;
}

export interface ListMemoriesOptions {
  userId?: string;
  agentId?: string;
  teamId?: string;
  topics?: string[];
  /** Free-text query. Absent = metadata scroll. */
  queryText?: string;
  limit?: number;
  /** 1-based page number */
  page?: number;
  sortBy?: SortField;
  sortOrder?: SortOrder;
  sortScope?: SortScope;
  mode?: SearchMode;
  signal?: AbortSignal;
}

export interface ListMemoriesResult {
  records: StoredMemory[];
  /** Exact number of records matching the filter, independent of the page */
  total: number;
}

export interface UserMemoryStats {
  user_id: string;
  total_memories: number;
  last_memory_updated_at: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}
