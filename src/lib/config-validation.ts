/**
 * Config validation (Zod) for the layered JSON config.
 *
 * Each section is validated on its own. An invalid section is dropped from
 * its layer (the lower layers and defaults apply) and every issue is reported
 * back to the caller for logging.
 */

import { z } from 'zod';
import type { PartialMnemosConfig } from './config-types.js';

const DistanceSchema = z.enum(['Cosine', 'Dot', 'Euclid', 'Manhattan']);

export const QdrantSchema = z.object({
  url: z.string().url().optional(),
  api_key: z.string().optional(),
  collection_prefix: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9_-]+$/, 'collection prefix may only contain letters, digits, "_" and "-"')
    .optional(),
  distance: DistanceSchema.optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export const EmbeddingsSchema = z.object({
  api_url: z.string().url().optional(),
  api_key: z.string().optional(),
  model: z.string().min(1).optional(),
  dimensions: z.number().int().positive().optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export const RetrievalSchema = z.object({
  rrf_k: z.number().positive().optional(),
  max_candidates: z.number().int().positive().optional(),
  default_limit: z.number().int().positive().optional(),
  sort_scope: z.enum(['global', 'page']).optional(),
});

export const ShortTermSchema = z.object({
  redis_url: z.string().min(1).optional(),
  ttl_seconds: z.number().int().positive().optional(),
  key_prefix: z.string().optional(),
});

export const ErrorReportingSchema = z.object({
  enabled: z.boolean().optional(),
  level: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  file_path: z.string().optional(),
  max_file_size_mb: z.number().positive().optional(),
  webhook_url: z.string().url().optional(),
  webhook_headers: z.record(z.string()).optional(),
});

export interface ConfigValidationResult {
  config: PartialMnemosConfig;
  issues: string[];
}

function collectIssues(section: string, error: z.ZodError, issues: string[]): void {
  for (const issue of error.issues) {
    const at = [section, ...issue.path].join('.');
    issues.push(`Invalid config value at "${at}": ${issue.message}`);
  }
}

/**
 * Validate one parsed config file. Never throws; invalid sections are
 * dropped and described in `issues`.
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const issues: string[] = [];
  const config: PartialMnemosConfig = {};

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    issues.push('Config file must contain a JSON object');
    return { config, issues };
  }

  const source = new Map<string, unknown>(Object.entries(raw));

  const qdrant = QdrantSchema.safeParse(source.get('qdrant') ?? {});
  if (qdrant.success) config.qdrant = qdrant.data;
  else collectIssues('qdrant', qdrant.error, issues);

  const embeddings = EmbeddingsSchema.safeParse(source.get('embeddings') ?? {});
  if (embeddings.success) config.embeddings = embeddings.data;
  else collectIssues('embeddings', embeddings.error, issues);

  const retrieval = RetrievalSchema.safeParse(source.get('retrieval') ?? {});
  if (retrieval.success) config.retrieval = retrieval.data;
  else collectIssues('retrieval', retrieval.error, issues);

  const shortTerm = ShortTermSchema.safeParse(source.get('short_term') ?? {});
  if (shortTerm.success) config.short_term = shortTerm.data;
  else collectIssues('short_term', shortTerm.error, issues);

  const errorReporting = ErrorReportingSchema.safeParse(source.get('error_reporting') ?? {});
  if (errorReporting.success) config.error_reporting = errorReporting.data;
  else collectIssues('error_reporting', errorReporting.error, issues);

  return { config, issues };
}
