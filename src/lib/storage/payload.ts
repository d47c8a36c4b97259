/**
 * Record <-> payload mapping and point identity.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { MemoryPayload, MemoryRecord, StoredMemory } from './types.js';

export const MemoryPayloadSchema = z.object({
  memory_id: z.string().min(1),
  user_id: z.string().nullable().default(null),
  agent_id: z.string().nullable().default(null),
  team_id: z.string().nullable().default(null),
  content: z.string(),
  topics: z.array(z.string()).default([]),
  input: z.string().nullable().default(null),
  updated_at: z.string(),
});

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Fixed namespace for name-based point ids. */
const POINT_ID_NAMESPACE = '6f0c5a3e-1d2b-4c8e-9a7f-3b5d2e1c4a90';

export function isUuid(value: string): boolean {
  return UUID_RE.test(value);
}

/**
 * Backend point id for a memory id: the id itself when it is a UUID,
 * otherwise a name-based UUID (RFC 4122 version 5) derived from it.
 */
export function pointIdFor(memoryId: string): string {
  if (isUuid(memoryId)) return memoryId.toLowerCase();

  const namespace = Buffer.from(POINT_ID_NAMESPACE.replace(/-/g, ''), 'hex');
  const digest = createHash('sha1').update(namespace).update(memoryId, 'utf8').digest();
  const bytes = digest.subarray(0, 16);
  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export function toPayload(record: MemoryRecord): MemoryPayload {
  return {
    memory_id: record.memory_id,
    user_id: record.user_id ?? null,
    agent_id: record.agent_id ?? null,
    team_id: record.team_id ?? null,
    content: record.content,
    topics: [...record.topics],
    input: record.input ?? null,
    updated_at: record.updated_at,
  };
}

/** Validate a payload read back from a backend. */
export function parsePayload(raw: unknown, context: { category: string; pointId: string }): MemoryPayload {
  const result = MemoryPayloadSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `Malformed payload on point ${context.pointId}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      { category: context.category, operation: 'parsePayload', pointId: context.pointId }
    );
  }
  return result.data;
}

export function toRecord(payload: MemoryPayload, score?: number): StoredMemory {
  const record: StoredMemory = {
    memory_id: payload.memory_id,
    content: payload.content,
    topics: [...payload.topics],
    updated_at: payload.updated_at,
  };
  if (payload.user_id !== null) record.user_id = payload.user_id;
  if (payload.agent_id !== null) record.agent_id = payload.agent_id;
  if (payload.team_id !== null) record.team_id = payload.team_id;
  if (payload.input !== null) record.input = payload.input;
  if (score !== undefined) record.score = score;
  return record;
}
