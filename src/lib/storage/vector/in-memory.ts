/**
 * In-process VectorBackend.
 *
 * Same observable contract as the Qdrant backend: named dense/sparse
 * vectors, exact filtering, count, scroll in point-id order. Used by tests
 * and by embedded callers through `createMemorySystem` overrides.
 */

import { cosineSimilarity } from '../../embeddings.js';
import { matchesFilter } from '../filter.js';
import type { CollectionSchema, Distance, Filter, PayloadIndexKind, SparseVector } from '../types.js';
import type {
  ScoredPoint,
  ScrollRequest,
  SearchRequest,
  StoredPoint,
  VectorBackend,
  VectorPoint,
} from './interface.js';

interface MemoryCollection {
  schema: CollectionSchema;
  points: Map<string, VectorPoint>;
  indexes: Map<string, PayloadIndexKind>;
}

/** Thrown for operations on a collection that does not exist. */
export class CollectionNotFoundError extends Error {
  readonly status = 404;

  constructor(name: string) {
    super(`Collection ${name} not found`);
    this.name = 'CollectionNotFoundError';
  }
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/** Raw score as Qdrant reports it: similarity for Cosine/Dot, distance otherwise. */
function denseScore(distance: Distance, a: number[], b: number[]): number {
  switch (distance) {
    case 'Cosine':
      return cosineSimilarity(a, b);
    case 'Dot':
      return dot(a, b);
    case 'Euclid':
      return Math.sqrt(a.reduce((sum, v, i) => sum + (v - b[i]) ** 2, 0));
    case 'Manhattan':
      return a.reduce((sum, v, i) => sum + Math.abs(v - b[i]), 0);
  }
}

function higherIsBetter(distance: Distance): boolean {
  return distance === 'Cosine' || distance === 'Dot';
}

function sparseDot(query: SparseVector, doc: SparseVector): number {
  const weights = new Map<number, number>();
  doc.indices.forEach((index, i) => weights.set(index, doc.values[i]));
  let score = 0;
  query.indices.forEach((index, i) => {
    score += query.values[i] * (weights.get(index) ?? 0);
  });
  return score;
}

function byId(a: { id: string }, b: { id: string }): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function toStored(point: VectorPoint): StoredPoint {
  return { id: point.id, payload: structuredClone(point.payload) };
}

export class InMemoryVectorBackend implements VectorBackend {
  private collections = new Map<string, MemoryCollection>();

  private get(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) throw new CollectionNotFoundError(name);
    return collection;
  }

  private matching(name: string, filter?: Filter): VectorPoint[] {
    return [...this.get(name).points.values()].filter((p) => matchesFilter(p.payload, filter));
  }

  async collectionExists(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<void> {
    if (this.collections.has(name)) {
      throw new Error(`Collection \`${name}\` already exists!`);
    }
    this.collections.set(name, { schema: { ...schema }, points: new Map(), indexes: new Map() });
  }

  async createPayloadIndex(name: string, field: string, kind: PayloadIndexKind): Promise<void> {
    this.get(name).indexes.set(field, kind);
  }

  /** Payload indexes registered on a collection (for inspection in tests). */
  payloadIndexes(name: string): Map<string, PayloadIndexKind> {
    return new Map(this.get(name).indexes);
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async upsert(name: string, points: VectorPoint[]): Promise<void> {
    const collection = this.get(name);
    for (const point of points) {
      if (point.dense.length !== collection.schema.dimensions) {
        throw new Error(
          `Wrong input: Vector dimension error: expected dim: ${collection.schema.dimensions}, got ${point.dense.length}`
        );
      }
      if (point.sparse && !collection.schema.sparse) {
        throw new Error(`Wrong input: Not existing vector name error: sparse`);
      }
      collection.points.set(point.id, structuredClone(point));
    }
  }

  async retrieve(name: string, ids: string[]): Promise<StoredPoint[]> {
    const collection = this.get(name);
    const found: StoredPoint[] = [];
    for (const id of ids) {
      const point = collection.points.get(id);
      if (point) found.push(toStored(point));
    }
    return found;
  }

  async delete(name: string, ids: string[]): Promise<void> {
    const collection = this.get(name);
    for (const id of ids) collection.points.delete(id);
  }

  async count(name: string, filter?: Filter): Promise<number> {
    return this.matching(name, filter).length;
  }

  async scroll(name: string, request: ScrollRequest): Promise<StoredPoint[]> {
    return this.matching(name, request.filter)
      .sort(byId)
      .slice(request.offset, request.offset + request.limit)
      .map(toStored);
  }

  async searchDense(name: string, request: SearchRequest<number[]>): Promise<ScoredPoint[]> {
    const { distance } = this.get(name).schema;
    const sign = higherIsBetter(distance) ? -1 : 1;
    return this.matching(name, request.filter)
      .map((point) => ({ ...toStored(point), score: denseScore(distance, request.vector, point.dense) }))
      .sort((a, b) => sign * (a.score - b.score) || byId(a, b))
      .slice(0, request.limit);
  }

  async searchSparse(name: string, request: SearchRequest<SparseVector>): Promise<ScoredPoint[]> {
    const collection = this.get(name);
    if (!collection.schema.sparse) {
      throw new Error(`Wrong input: Not existing vector name error: sparse`);
    }
    const scored: ScoredPoint[] = [];
    for (const point of this.matching(name, request.filter)) {
      if (!point.sparse) continue;
      const score = sparseDot(request.vector, point.sparse);
      if (score > 0) scored.push({ ...toStored(point), score });
    }
    return scored.sort((a, b) => b.score - a.score || byId(a, b)).slice(0, request.limit);
  }

  async close(): Promise<void> {
    this.collections.clear();
  }
}
