/**
 * Filter builder: tenant and topic parameters to a backend-neutral
 * conjunction of predicates. Pure; backends translate the result.
 */

import type { Filter, FilterCondition } from './types.js';

export interface FilterParams {
  userId?: string;
  agentId?: string;
  teamId?: string;
  topics?: string[];
}

/**
 * Build a filter from tenant ids and topics.
 * Returns undefined (match everything) when nothing is given.
 * An empty topics list adds no predicate.
 */
export function buildFilter(params: FilterParams = {}): Filter | undefined {
  const must: FilterCondition[] = [];

  if (params.userId !== undefined) must.push({ kind: 'equals', field: 'user_id', value: params.userId });
  if (params.agentId !== undefined) must.push({ kind: 'equals', field: 'agent_id', value: params.agentId });
  if (params.teamId !== undefined) must.push({ kind: 'equals', field: 'team_id', value: params.teamId });
  if (params.topics && params.topics.length > 0) {
    must.push({ kind: 'matchAny', field: 'topics', values: [...params.topics] });
  }

  return must.length > 0 ? { must } : undefined;
}

/** In-process evaluation of a filter against a stored payload. */
export function matchesFilter(
  payload: { user_id: string | null; agent_id: string | null; team_id: string | null; topics: string[] },
  filter?: Filter
): boolean {
  if (!filter) return true;
  return filter.must.every((condition) => {
    switch (condition.kind) {
      case 'equals':
        return payload[condition.field] === condition.value;
      case 'matchAny':
        return condition.values.some((topic) => payload.topics.includes(topic));
    }
  });
}
