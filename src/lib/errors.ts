/**
 * Custom error hierarchy for mnemos.
 *
 * Provides programmatic error discrimination without parsing message strings.
 * Each subclass carries a `code` string for structured error handling, and a
 * `context` naming at least the category and operation when raised by a store.
 */

export interface ErrorContext {
  category?: string;
  operation?: string;
  [key: string]: unknown;
}

/** Base error for all mnemos errors. Carries a `code`, optional `context` and `cause`. */
export class MnemosError extends Error {
  readonly code: string;
  readonly context?: ErrorContext;

  constructor(
    message: string,
    code: string = 'MNEMOS_ERROR',
    context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MnemosError';
    this.code = code;
    this.context = context;
  }
}

/** Configuration errors: missing connection info, invalid config values. Fatal at construction. */
export class ConfigError extends MnemosError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Collection or payload index creation failed. Not retried. */
export class ProvisioningError extends MnemosError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, 'PROVISIONING_ERROR', context, options);
    this.name = 'ProvisioningError';
  }
}

/** Backend I/O errors: network failures, timeouts, backend-side rejections. */
export class BackendError extends MnemosError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: { cause?: unknown },
    code: string = 'BACKEND_ERROR'
  ) {
    super(message, code, context, options);
    this.name = 'BackendError';
  }
}

/** Embedding provider failures. Treated as backend I/O, never defaulted to a zero vector. */
export class EmbeddingError extends BackendError {
  readonly statusCode?: number;

  constructor(
    message: string,
    context?: ErrorContext,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, context, options, 'EMBEDDING_ERROR');
    this.name = 'EmbeddingError';
    this.statusCode = options?.statusCode;
  }
}

/** Validation errors: bad input, precondition failures, malformed stored payloads. */
export class ValidationError extends MnemosError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/** Type guard: check if an error is a MnemosError or subclass. */
export function isMnemosError(error: unknown): error is MnemosError {
  return error instanceof MnemosError;
}

/** Best-effort message extraction for logging. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
