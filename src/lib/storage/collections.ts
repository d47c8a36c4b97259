/**
 * Collection registry: logical category -> physical collection.
 *
 * Collections are created lazily on the write path. Existence is re-checked
 * on every ensure() so collections provisioned out of band are picked up,
 * and a missing collection is never remembered. A collection whose payload
 * indexes could not be created is dropped again.
 */

import { ProvisioningError, errorMessage } from '../errors.js';
import { logError, logInfo } from '../fault-logger.js';
import type { VectorBackend } from './vector/interface.js';
import type { CollectionSchema, Distance, MemoryCategory, PayloadIndexKind } from './types.js';

export interface CollectionHandle {
  category: MemoryCategory;
  name: string;
  schema: CollectionSchema;
}

/** Which categories carry a sparse vector slot. */
const SPARSE_SLOT: Record<MemoryCategory, boolean> = {
  memories: true,
  sessions: false,
  knowledge: true,
};

export const PAYLOAD_INDEXES: ReadonlyArray<{ field: string; kind: PayloadIndexKind }> = [
  { field: 'memory_id', kind: 'keyword' },
  { field: 'user_id', kind: 'keyword' },
  { field: 'agent_id', kind: 'keyword' },
  { field: 'team_id', kind: 'keyword' },
  { field: 'topics', kind: 'keyword' },
  { field: 'updated_at', kind: 'datetime' },
];

export function collectionName(prefix: string, category: MemoryCategory): string {
  return `${prefix}_${category}`;
}

export interface CollectionRegistryOptions {
  prefix: string;
  dimensions: number;
  distance: Distance;
}

export class CollectionRegistry {
  constructor(
    private readonly backend: VectorBackend,
    private readonly options: CollectionRegistryOptions
  ) {}

  handle(category: MemoryCategory): CollectionHandle {
    return {
      category,
      name: collectionName(this.options.prefix, category),
      schema: {
        dimensions: this.options.dimensions,
        distance: this.options.distance,
        sparse: SPARSE_SLOT[category],
      },
    };
  }

  /** Handle when the collection exists, undefined otherwise. Never creates. */
  async lookup(category: MemoryCategory): Promise<CollectionHandle | undefined> {
    const handle = this.handle(category);
    return (await this.backend.collectionExists(handle.name)) ? handle : undefined;
  }

  /** Idempotent: returns the handle, creating the collection and its indexes first if needed. */
  async ensure(category: MemoryCategory): Promise<CollectionHandle> {
    const handle = this.handle(category);
    const context = { category, operation: 'ensure', collection: handle.name };

    let exists: boolean;
    try {
      exists = await this.backend.collectionExists(handle.name);
    } catch (error) {
      logError('collections', `Failed to check collection ${handle.name}`, error, context);
      throw new ProvisioningError(
        `Failed to check collection ${handle.name}: ${errorMessage(error)}`,
        context,
        { cause: error }
      );
    }
    if (exists) return handle;

    try {
      await this.backend.createCollection(handle.name, handle.schema);
    } catch (error) {
      // Lost a race with another creator
      if (await this.backend.collectionExists(handle.name).catch(() => false)) return handle;
      logError('collections', `Failed to create collection ${handle.name}`, error, context);
      throw new ProvisioningError(
        `Failed to create collection ${handle.name}: ${errorMessage(error)}`,
        context,
        { cause: error }
      );
    }

    try {
      for (const index of PAYLOAD_INDEXES) {
        await this.backend.createPayloadIndex(handle.name, index.field, index.kind);
      }
    } catch (error) {
      logError('collections', `Failed to create payload indexes on ${handle.name}`, error, context);
      await this.dropPartial(handle.name, context);
      throw new ProvisioningError(
        `Failed to create payload indexes on ${handle.name}: ${errorMessage(error)}`,
        context,
        { cause: error }
      );
    }

    logInfo('collections', `Created collection ${handle.name}`, {
      dimensions: handle.schema.dimensions,
      distance: handle.schema.distance,
      sparse: handle.schema.sparse,
    });
    return handle;
  }

  /** Drop a collection left without its indexes so the next ensure() provisions it again. */
  private async dropPartial(name: string, context: Record<string, string>): Promise<void> {
    try {
      await this.backend.deleteCollection(name);
    } catch (error) {
      logError('collections', `Failed to drop partially provisioned collection ${name}`, error, context);
    }
  }
}
