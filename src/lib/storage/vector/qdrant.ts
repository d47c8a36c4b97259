/**
 * Qdrant vector backend.
 *
 * Collections use named vectors: `dense` (size/distance from the schema) and,
 * when the schema has a sparse slot, `sparse` with the `idf` modifier so
 * Qdrant applies IDF to the BM25 term weights at query time.
 *
 * Payloads carry the full memory record, so searches return records
 * without a second round-trip.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { ConfigError } from '../../errors.js';
import { parsePayload } from '../payload.js';
import type { CollectionSchema, Filter, PayloadIndexKind, SparseVector } from '../types.js';
import type {
  ScoredPoint,
  ScrollRequest,
  SearchRequest,
  StoredPoint,
  VectorBackend,
  VectorPoint,
} from './interface.js';

export interface QdrantConfig {
  url?: string;
  apiKey?: string;
  /** Request timeout in ms */
  timeout?: number;
}

type QdrantCondition =
  | { key: string; match: { value: string } }
  | { key: string; match: { any: string[] } };

interface QdrantFilter {
  must: QdrantCondition[];
}

const SCROLL_PAGE_SIZE = 256;

/** Translate a backend-neutral filter to Qdrant's filter syntax. */
export function toQdrantFilter(filter?: Filter): QdrantFilter | undefined {
  if (!filter || filter.must.length === 0) return undefined;
  return {
    must: filter.must.map((condition): QdrantCondition => {
      switch (condition.kind) {
        case 'equals':
          return { key: condition.field, match: { value: condition.value } };
        case 'matchAny':
          return { key: condition.field, match: { any: condition.values } };
      }
    }),
  };
}

function pointId(id: string | number): string {
  return String(id);
}

export class QdrantVectorBackend implements VectorBackend {
  private client: QdrantClient | null = null;
  private config: QdrantConfig;

  constructor(config: QdrantConfig) {
    if (!config.url) {
      throw new ConfigError('Qdrant URL is required (qdrant.url or QDRANT_URL)', {
        operation: 'connect',
      });
    }
    this.config = config;
  }

  private getClient(): QdrantClient {
    if (this.client) return this.client;
    this.client = new QdrantClient({
      url: this.config.url,
      apiKey: this.config.apiKey,
      timeout: this.config.timeout,
    });
    return this.client;
  }

  private toStored(collection: string, id: string | number, payload: unknown): StoredPoint {
    const pid = pointId(id);
    return { id: pid, payload: parsePayload(payload, { category: collection, pointId: pid }) };
  }

  // ==========================================================================
  // Collections
  // ==========================================================================

  async collectionExists(name: string): Promise<boolean> {
    const result = await this.getClient().collectionExists(name);
    return result.exists;
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<void> {
    const vectors = {
      dense: {
        size: schema.dimensions,
        distance: schema.distance,
      },
    };

    if (schema.sparse) {
      await this.getClient().createCollection(name, {
        vectors,
        sparse_vectors: {
          sparse: {
            modifier: 'idf' as const,
          },
        },
      });
    } else {
      await this.getClient().createCollection(name, { vectors });
    }
  }

  async createPayloadIndex(name: string, field: string, kind: PayloadIndexKind): Promise<void> {
    await this.getClient().createPayloadIndex(name, {
      field_name: field,
      field_schema: kind,
      wait: true,
    });
  }

  async deleteCollection(name: string): Promise<void> {
    if (!(await this.collectionExists(name))) return;
    await this.getClient().deleteCollection(name);
  }

  // ==========================================================================
  // Points
  // ==========================================================================

  async upsert(name: string, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.getClient().upsert(name, {
      wait: true,
      points: points.map((point) => ({
        id: point.id,
        vector: point.sparse
          ? { dense: point.dense, sparse: { indices: point.sparse.indices, values: point.sparse.values } }
          : { dense: point.dense },
        payload: { ...point.payload },
      })),
    });
  }

  async retrieve(name: string, ids: string[]): Promise<StoredPoint[]> {
    if (ids.length === 0) return [];
    const records = await this.getClient().retrieve(name, {
      ids,
      with_payload: true,
      with_vector: false,
    });
    return records.map((record) => this.toStored(name, record.id, record.payload));
  }

  async delete(name: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.getClient().delete(name, { wait: true, points: ids });
  }

  async count(name: string, filter?: Filter): Promise<number> {
    const result = await this.getClient().count(name, {
      filter: toQdrantFilter(filter),
      exact: true,
    });
    return result.count;
  }

  /**
   * Qdrant scrolls by cursor (next_page_offset), not by position, so the
   * first `offset` matches are paged through and dropped.
   */
  async scroll(name: string, request: ScrollRequest): Promise<StoredPoint[]> {
    const wanted = request.offset + request.limit;
    const filter = toQdrantFilter(request.filter);
    const collected: StoredPoint[] = [];
    let cursor: string | number | undefined;

    while (collected.length < wanted) {
      const page = await this.getClient().scroll(name, {
        filter,
        limit: Math.min(wanted - collected.length, SCROLL_PAGE_SIZE),
        offset: cursor,
        with_payload: true,
        with_vector: false,
      });
      for (const point of page.points) {
        collected.push(this.toStored(name, point.id, point.payload));
      }

      const next = page.next_page_offset;
      if (typeof next === 'string' || typeof next === 'number') {
        cursor = next;
      } else {
        break;
      }
    }

    return collected.slice(request.offset, wanted);
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  async searchDense(name: string, request: SearchRequest<number[]>): Promise<ScoredPoint[]> {
    const result = await this.getClient().query(name, {
      query: request.vector,
      using: 'dense',
      filter: toQdrantFilter(request.filter),
      limit: request.limit,
      with_payload: true,
    });
    return result.points.map((point) => ({
      ...this.toStored(name, point.id, point.payload),
      score: point.score,
    }));
  }

  async searchSparse(name: string, request: SearchRequest<SparseVector>): Promise<ScoredPoint[]> {
    if (request.vector.indices.length === 0) return [];
    const result = await this.getClient().query(name, {
      query: { indices: request.vector.indices, values: request.vector.values },
      using: 'sparse',
      filter: toQdrantFilter(request.filter),
      limit: request.limit,
      with_payload: true,
    });
    return result.points
      .filter((point) => point.score > 0)
      .map((point) => ({
        ...this.toStored(name, point.id, point.payload),
        score: point.score,
      }));
  }

  async close(): Promise<void> {
    this.client = null;
  }
}
