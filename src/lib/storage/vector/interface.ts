/**
 * VectorBackend interface for abstracting vector storage.
 *
 * Implementations:
 * - Qdrant (`@qdrant/js-client-rest`)
 * - in-process (tests, local runs)
 *
 * Point ids are UUID strings. Payloads are flat memory payloads.
 */

import type {
  CollectionSchema,
  Filter,
  MemoryPayload,
  PayloadIndexKind,
  SparseVector,
} from '../types.js';

export interface VectorPoint {
  id: string;
  dense: number[];
  /** Omitted for collections without a sparse slot */
  sparse?: SparseVector;
  payload: MemoryPayload;
}

export interface StoredPoint {
  id: string;
  payload: MemoryPayload;
}

export interface ScoredPoint extends StoredPoint {
  score: number;
}

export interface ScrollRequest {
  filter?: Filter;
  limit: number;
  /** Number of matching points to skip, in point-id order */
  offset: number;
}

export interface SearchRequest<V> {
  vector: V;
  filter?: Filter;
  limit: number;
}

export interface VectorBackend {
  // ============================================================================
  // Collections
  // ============================================================================

  collectionExists(name: string): Promise<boolean>;

  /** Create a collection with named vectors `dense` and, when `schema.sparse`, `sparse`. */
  createCollection(name: string, schema: CollectionSchema): Promise<void>;

  createPayloadIndex(name: string, field: string, kind: PayloadIndexKind): Promise<void>;

  /** Drop a collection. Dropping a missing collection is a no-op. */
  deleteCollection(name: string): Promise<void>;

  // ============================================================================
  // Points
  // ============================================================================

  /** Insert or fully replace points. */
  upsert(name: string, points: VectorPoint[]): Promise<void>;

  retrieve(name: string, ids: string[]): Promise<StoredPoint[]>;

  /** Delete points by id. Unknown ids are ignored. */
  delete(name: string, ids: string[]): Promise<void>;

  /** Exact number of points matching the filter. */
  count(name: string, filter?: Filter): Promise<number>;

  scroll(name: string, request: ScrollRequest): Promise<StoredPoint[]>;

  // ============================================================================
  // Search
  // ============================================================================

  /** Top-`limit` points by dense similarity, best first. */
  searchDense(name: string, request: SearchRequest<number[]>): Promise<ScoredPoint[]>;

  /** Top-`limit` points by sparse dot product, best first. Zero-score points are excluded. */
  searchSparse(name: string, request: SearchRequest<SparseVector>): Promise<ScoredPoint[]>;

  close?(): Promise<void>;
}
