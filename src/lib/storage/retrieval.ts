/**
 * Hybrid retrieval engine.
 *
 * Without a query: metadata scroll over the filter.
 * With a query: dense top-K and sparse top-K searches over the same filter,
 * fused with Reciprocal Rank Fusion. Totals always come from an exact count
 * over the filter, never from the size of a result set.
 *
 * Both lists are fetched to the same depth for every page of a query
 * (min(total, maxCandidates)), so all pages slice one fused order.
 *
 * Sorting is applied to the whole candidate set before pagination
 * (`scope: 'global'`) or to the returned page only (`scope: 'page'`).
 */

import { abortable, throwIfAborted } from '../abort.js';
import { reciprocalRankFusion, RRF_K, type RankedItem, type SparseEncoder } from '../bm25.js';
import type { EmbeddingProvider } from '../embeddings.js';
import { ValidationError } from '../errors.js';
import { toRecord } from './payload.js';
import type { CollectionRegistry, CollectionHandle } from './collections.js';
import type { ScoredPoint, VectorBackend } from './vector/interface.js';
import {
  SORT_FIELDS,
  type Filter,
  type MemoryCategory,
  type SearchMode,
  type SortField,
  type SortSpec,
  type StoredMemory,
} from './types.js';

export interface RetrievalOptions {
  rrfK?: number;
  /** Retrieval depth per vector search = (offset + limit) × multiplier */
  maxCandidates?: number;
}

export interface SearchOptions {
  queryText?: string;
  filter?: Filter;
  limit: number;
  offset: number;
  mode?: SearchMode;
  sort?: SortSpec;
  signal?: AbortSignal;
}

export interface SearchResult {
  records: StoredMemory[];
  total: number;
}

export function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some((field) => field === value);
}

export function parseSortField(value: string): SortField {
  if (!isSortField(value)) {
    throw new ValidationError(`Cannot sort by "${value}". Sortable fields: ${SORT_FIELDS.join(', ')}`, {
      operation: 'sort',
    });
  }
  return value;
}

function compareValues(a: StoredMemory, b: StoredMemory, field: SortField): number {
  const left = a[field] ?? '';
  const right = b[field] ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Stable in-memory sort by one record field. Missing values sort as ''. */
export function sortRecords(records: StoredMemory[], field: SortField, order: 'asc' | 'desc'): StoredMemory[] {
  const direction = order === 'desc' ? -1 : 1;
  return [...records].sort((a, b) => direction * compareValues(a, b, field));
}

function paginate(records: StoredMemory[], offset: number, limit: number, sort?: SortSpec): StoredMemory[] {
  if (!sort) return records.slice(offset, offset + limit);
  if (sort.scope === 'global') {
    return sortRecords(records, sort.field, sort.order).slice(offset, offset + limit);
  }
  return sortRecords(records.slice(offset, offset + limit), sort.field, sort.order);
}

function toRanked(points: ScoredPoint[]): RankedItem<ScoredPoint>[] {
  return points.map((point) => ({ id: point.id, item: point }));
}

export class HybridRetriever {
  private readonly rrfK: number;
  private readonly maxCandidates: number;

  constructor(
    private readonly registry: CollectionRegistry,
    private readonly backend: VectorBackend,
    private readonly embedder: EmbeddingProvider,
    private readonly sparseEncoder: SparseEncoder,
    options: RetrievalOptions = {}
  ) {
    this.rrfK = options.rrfK ?? RRF_K;
    this.maxCandidates = options.maxCandidates ?? 1000;
  }

  async search(category: MemoryCategory, options: SearchOptions): Promise<SearchResult> {
    const { signal } = options;
    throwIfAborted(signal);

    // Read path never provisions: a missing collection is zero matches
    const handle = await abortable(() => this.registry.lookup(category), signal);
    if (!handle) return { records: [], total: 0 };

    const query = options.queryText?.trim();
    if (!query) return this.scroll(handle, options);
    return this.vectorSearch(handle, query, options);
  }

  private async scroll(handle: CollectionHandle, options: SearchOptions): Promise<SearchResult> {
    const { filter, limit, offset, sort, signal } = options;
    const total = await abortable(() => this.backend.count(handle.name, filter), signal);
    if (total === 0) return { records: [], total };

    if (sort?.scope === 'global') {
      const all = await abortable(
        () => this.backend.scroll(handle.name, { filter, limit: total, offset: 0 }),
        signal
      );
      return { records: paginate(all.map((p) => toRecord(p.payload)), offset, limit, sort), total };
    }

    const page = await abortable(() => this.backend.scroll(handle.name, { filter, limit, offset }), signal);
    return { records: paginate(page.map((p) => toRecord(p.payload)), 0, limit, sort), total };
  }

  private async vectorSearch(handle: CollectionHandle, query: string, options: SearchOptions): Promise<SearchResult> {
    const { filter, limit, offset, sort, signal } = options;
    const requested = options.mode ?? 'hybrid';
    const mode: SearchMode = handle.schema.sparse ? requested : 'dense';

    const total = await abortable(() => this.backend.count(handle.name, filter), signal);
    if (total === 0) return { records: [], total };
    const depth = Math.min(total, this.maxCandidates);

    const denseSearch = async (): Promise<ScoredPoint[]> => {
      if (mode === 'sparse') return [];
      const vector = await this.embedder.embed(query, signal);
      return abortable(() => this.backend.searchDense(handle.name, { vector, filter, limit: depth }), signal);
    };
    const sparseSearch = async (): Promise<ScoredPoint[]> => {
      if (mode === 'dense') return [];
      const vector = this.sparseEncoder.encodeQuery(query);
      return abortable(() => this.backend.searchSparse(handle.name, { vector, filter, limit: depth }), signal);
    };

    const [dense, sparse] = await Promise.all([denseSearch(), sparseSearch()]);

    let candidates: StoredMemory[];
    if (mode === 'hybrid') {
      candidates = reciprocalRankFusion([toRanked(dense), toRanked(sparse)], this.rrfK).map((fused) =>
        toRecord(fused.item.payload, fused.score)
      );
    } else {
      candidates = (mode === 'dense' ? dense : sparse).map((point) => toRecord(point.payload, point.score));
    }

    return { records: paginate(candidates, offset, limit, sort), total };
  }
}
