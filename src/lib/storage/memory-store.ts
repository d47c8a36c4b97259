/**
 * Long-term memory store.
 *
 * One store per category. Writes embed `content` (dense + sparse), provision
 * the collection if needed and upsert a point whose payload is the record.
 * Reads never provision; a collection that doesn't exist yet reads as empty.
 *
 * Backend failures are logged and re-thrown with category and operation in
 * the error context. Aborts re-throw the signal's reason unchanged.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { abortable, isAbortReason, throwIfAborted } from '../abort.js';
import { Bm25SparseEncoder, type SparseEncoder } from '../bm25.js';
import { zeroVector, type EmbeddingProvider } from '../embeddings.js';
import {
  BackendError,
  EmbeddingError,
  ProvisioningError,
  ValidationError,
  errorMessage,
  isMnemosError,
} from '../errors.js';
import { logError } from '../fault-logger.js';
import { CollectionRegistry, type CollectionHandle } from './collections.js';
import { buildFilter } from './filter.js';
import { pointIdFor, toPayload, toRecord } from './payload.js';
import { HybridRetriever } from './retrieval.js';
import type { StoredPoint, VectorBackend, VectorPoint } from './vector/interface.js';
import type {
  Distance,
  ListMemoriesOptions,
  ListMemoriesResult,
  MemoryCategory,
  MemoryInput,
  MemoryRecord,
  OperationOptions,
  SortScope,
  SortSpec,
  UserMemoryStats,
} from './types.js';

const UPSERT_BATCH_SIZE = 100;

const MemoryInputSchema = z.object({
  memory_id: z.string().min(1, 'memory_id must not be empty').optional(),
  user_id: z.string().optional(),
  agent_id: z.string().optional(),
  team_id: z.string().optional(),
  content: z.string({ required_error: 'content is required' }),
  topics: z.array(z.string()).optional(),
  input: z.string().optional(),
});

export interface UserStatsOptions extends OperationOptions {
  limit?: number;
  page?: number;
}

export interface UserStatsResult {
  stats: UserMemoryStats[];
  /** Number of distinct users */
  total: number;
}

/** Full record-store contract. Every member is implemented; nothing is a silent no-op. */
export interface MemoryRecordStore {
  readonly category: MemoryCategory;

  upsertMemory(input: MemoryInput, options?: OperationOptions): Promise<MemoryRecord>;
  upsertMemories(inputs: MemoryInput[], options?: OperationOptions): Promise<MemoryRecord[]>;
  getMemory(memoryId: string, options?: OperationOptions): Promise<MemoryRecord | undefined>;
  listMemories(options?: ListMemoriesOptions): Promise<ListMemoriesResult>;
  deleteMemory(memoryId: string, options?: OperationOptions): Promise<void>;
  deleteMemories(memoryIds: string[], options?: OperationOptions): Promise<void>;
  clearMemories(options?: OperationOptions): Promise<void>;
  getAllTopics(options?: OperationOptions): Promise<string[]>;
  getUserMemoryStats(options?: UserStatsOptions): Promise<UserStatsResult>;
}

export interface LongTermMemoryStoreOptions {
  category: MemoryCategory;
  backend: VectorBackend;
  embedder: EmbeddingProvider;
  sparseEncoder?: SparseEncoder;
  collectionPrefix: string;
  distance?: Distance;
  rrfK?: number;
  maxCandidates?: number;
  defaultLimit?: number;
  sortScope?: SortScope;
  /** Timestamp source for `updated_at` */
  clock?: () => Date;
}

function positiveInteger(value: number, name: string, category: MemoryCategory): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, {
      category,
      operation: 'listMemories',
    });
  }
  return value;
}

export class LongTermMemoryStore implements MemoryRecordStore {
  readonly category: MemoryCategory;

  private readonly backend: VectorBackend;
  private readonly embedder: EmbeddingProvider;
  private readonly sparseEncoder: SparseEncoder;
  private readonly registry: CollectionRegistry;
  private readonly retriever: HybridRetriever;
  private readonly defaultLimit: number;
  private readonly sortScope: SortScope;
  private readonly clock: () => Date;

  constructor(options: LongTermMemoryStoreOptions) {
    this.category = options.category;
    this.backend = options.backend;
    this.embedder = options.embedder;
    this.sparseEncoder = options.sparseEncoder ?? new Bm25SparseEncoder();
    this.registry = new CollectionRegistry(options.backend, {
      prefix: options.collectionPrefix,
      dimensions: options.embedder.dimensions,
      distance: options.distance ?? 'Cosine',
    });
    this.retriever = new HybridRetriever(this.registry, options.backend, options.embedder, this.sparseEncoder, {
      rrfK: options.rrfK,
      maxCandidates: options.maxCandidates,
    });
    this.defaultLimit = options.defaultLimit ?? 100;
    this.sortScope = options.sortScope ?? 'global';
    this.clock = options.clock ?? (() => new Date());
  }

  /** Physical collection name for this store's category. */
  get collectionName(): string {
    return this.registry.handle(this.category).name;
  }

  // ==========================================================================
  // Error handling
  // ==========================================================================

  private async run<T>(operation: string, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    throwIfAborted(signal);
    try {
      return await fn();
    } catch (error) {
      if (isAbortReason(error, signal)) throw error;
      // Already logged by the registry
      if (error instanceof ProvisioningError) throw error;

      const context = { category: this.category, operation };
      logError('memory-store', `${operation} failed on ${this.category}`, error, context);

      if (error instanceof EmbeddingError) {
        throw new EmbeddingError(error.message, { ...error.context, ...context }, {
          cause: error,
          statusCode: error.statusCode,
        });
      }
      if (isMnemosError(error)) throw error;
      throw new BackendError(`${operation} failed on ${this.category}: ${errorMessage(error)}`, context, {
        cause: error,
      });
    }
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private prepare(input: MemoryInput, now: string): MemoryRecord {
    const parsed = MemoryInputSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Invalid memory: ${issue ? `${issue.path.join('.') || 'input'} ${issue.message}` : 'invalid'}`,
        { category: this.category, operation: 'upsertMemory' }
      );
    }
    const data = parsed.data;

    const record: MemoryRecord = {
      memory_id: data.memory_id ?? randomUUID(),
      content: data.content,
      topics: data.topics ?? [],
      updated_at: now,
    };
    if (data.user_id !== undefined) record.user_id = data.user_id;
    if (data.agent_id !== undefined) record.agent_id = data.agent_id;
    if (data.team_id !== undefined) record.team_id = data.team_id;
    if (data.input !== undefined) record.input = data.input;
    return record;
  }

  /** Embeddings for a record. Blank content gets a zero dense vector and no sparse terms. */
  private async toPoint(record: MemoryRecord, signal?: AbortSignal): Promise<VectorPoint> {
    const blank = record.content.trim() === '';
    const dense = blank ? zeroVector(this.embedder.dimensions) : await this.embedder.embed(record.content, signal);

    const point: VectorPoint = { id: pointIdFor(record.memory_id), dense, payload: toPayload(record) };
    if (this.registry.handle(this.category).schema.sparse) {
      point.sparse = blank ? { indices: [], values: [] } : this.sparseEncoder.encodeDocument(record.content);
    }
    return point;
  }

  async upsertMemory(input: MemoryInput, options: OperationOptions = {}): Promise<MemoryRecord> {
    const [record] = await this.upsertMemories([input], options);
    return record;
  }

  async upsertMemories(inputs: MemoryInput[], options: OperationOptions = {}): Promise<MemoryRecord[]> {
    const { signal } = options;
    const now = this.clock().toISOString();
    const records = inputs.map((input) => this.prepare(input, now));
    if (records.length === 0) return [];

    return this.run(records.length === 1 ? 'upsertMemory' : 'upsertMemories', signal, async () => {
      const points: VectorPoint[] = [];
      for (const record of records) {
        points.push(await this.toPoint(record, signal));
      }

      const handle = await abortable(() => this.registry.ensure(this.category), signal);
      for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
        const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
        await abortable(() => this.backend.upsert(handle.name, batch), signal);
      }
      return records;
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async getMemory(memoryId: string, options: OperationOptions = {}): Promise<MemoryRecord | undefined> {
    const { signal } = options;
    return this.run('getMemory', signal, async () => {
      const handle = await abortable(() => this.registry.lookup(this.category), signal);
      if (!handle) return undefined;

      const [point] = await abortable(() => this.backend.retrieve(handle.name, [pointIdFor(memoryId)]), signal);
      return point ? toRecord(point.payload) : undefined;
    });
  }

  async listMemories(options: ListMemoriesOptions = {}): Promise<ListMemoriesResult> {
    const limit = positiveInteger(options.limit ?? this.defaultLimit, 'limit', this.category);
    const offset = options.page !== undefined
      ? (positiveInteger(options.page, 'page', this.category) - 1) * limit
      : 0;

    const sort: SortSpec | undefined = options.sortBy
      ? { field: options.sortBy, order: options.sortOrder ?? 'asc', scope: options.sortScope ?? this.sortScope }
      : undefined;

    const filter = buildFilter({
      userId: options.userId,
      agentId: options.agentId,
      teamId: options.teamId,
      topics: options.topics,
    });

    return this.run('listMemories', options.signal, () =>
      this.retriever.search(this.category, {
        queryText: options.queryText,
        filter,
        limit,
        offset,
        mode: options.mode,
        sort,
        signal: options.signal,
      })
    );
  }

  /** Every point of the collection, in point-id order. Empty when not provisioned. */
  private async scrollAll(handle: CollectionHandle, signal?: AbortSignal): Promise<StoredPoint[]> {
    const total = await abortable(() => this.backend.count(handle.name), signal);
    if (total === 0) return [];
    return abortable(() => this.backend.scroll(handle.name, { limit: total, offset: 0 }), signal);
  }

  async getAllTopics(options: OperationOptions = {}): Promise<string[]> {
    const { signal } = options;
    return this.run('getAllTopics', signal, async () => {
      const handle = await abortable(() => this.registry.lookup(this.category), signal);
      if (!handle) return [];

      const topics = new Set<string>();
      for (const point of await this.scrollAll(handle, signal)) {
        for (const topic of point.payload.topics) topics.add(topic);
      }
      return [...topics].sort();
    });
  }

  async getUserMemoryStats(options: UserStatsOptions = {}): Promise<UserStatsResult> {
    const limit = positiveInteger(options.limit ?? this.defaultLimit, 'limit', this.category);
    const page = positiveInteger(options.page ?? 1, 'page', this.category);
    const { signal } = options;

    return this.run('getUserMemoryStats', signal, async () => {
      const handle = await abortable(() => this.registry.lookup(this.category), signal);
      if (!handle) return { stats: [], total: 0 };

      const byUser = new Map<string, UserMemoryStats>();
      for (const { payload } of await this.scrollAll(handle, signal)) {
        if (payload.user_id === null) continue;
        const current = byUser.get(payload.user_id);
        if (!current) {
          byUser.set(payload.user_id, {
            user_id: payload.user_id,
            total_memories: 1,
            last_memory_updated_at: payload.updated_at,
          });
        } else {
          current.total_memories += 1;
          if (payload.updated_at > current.last_memory_updated_at) {
            current.last_memory_updated_at = payload.updated_at;
          }
        }
      }

      const stats = [...byUser.values()].sort((a, b) => {
        if (a.last_memory_updated_at !== b.last_memory_updated_at) {
          return a.last_memory_updated_at < b.last_memory_updated_at ? 1 : -1;
        }
        return a.user_id < b.user_id ? -1 : a.user_id > b.user_id ? 1 : 0;
      });
      const offset = (page - 1) * limit;
      return { stats: stats.slice(offset, offset + limit), total: stats.length };
    });
  }

  // ==========================================================================
  // Deletes
  // ==========================================================================

  async deleteMemory(memoryId: string, options: OperationOptions = {}): Promise<void> {
    await this.deleteMemories([memoryId], options);
  }

  async deleteMemories(memoryIds: string[], options: OperationOptions = {}): Promise<void> {
    if (memoryIds.length === 0) return;
    const { signal } = options;

    await this.run(memoryIds.length === 1 ? 'deleteMemory' : 'deleteMemories', signal, async () => {
      const handle = await abortable(() => this.registry.lookup(this.category), signal);
      if (!handle) return;
      await abortable(() => this.backend.delete(handle.name, memoryIds.map(pointIdFor)), signal);
    });
  }

  /** Drops the category's collection; the next write provisions it again. */
  async clearMemories(options: OperationOptions = {}): Promise<void> {
    const { signal } = options;
    await this.run('clearMemories', signal, () =>
      abortable(() => this.backend.deleteCollection(this.collectionName), signal)
    );
  }
}
