/**
 * Engine error taxonomy.
 *
 * Infrastructure failures (cache, AI provider) are absorbed by the engine and
 * degrade the result. Only ValidationError and NotFoundError reach callers;
 * rate limiting answers with a RateLimitDecision instead of an error.
 */

export type EngineErrorCode =
  | 'CACHE_UNAVAILABLE'
  | 'GENERATION_UNAVAILABLE'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'PROVIDER_ERROR';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CacheUnavailableError extends EngineError {
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('CACHE_UNAVAILABLE', `Cache unavailable during ${operation}${detail}`, { cause });
  }
}

export type GenerationFailureReason =
  | 'quota'
  | 'network'
  | 'timeout'
  | 'server'
  | 'client'
  | 'invalid_payload';

export class GenerationUnavailableError extends EngineError {
  readonly reason: GenerationFailureReason;

  constructor(reason: GenerationFailureReason, message: string, cause?: unknown) {
    super('GENERATION_UNAVAILABLE', message, { cause });
    this.reason = reason;
  }
}

export class ValidationError extends EngineError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('VALIDATION_ERROR', message);
    this.field = field;
  }
}

export class NotFoundError extends EngineError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} not found: ${id}`);
  }
}

export type ProviderErrorKind = 'quota' | 'network' | 'timeout' | 'server' | 'client';

/**
 * Raised by a ProjectGenerator. The adapter turns it into a retry or a
 * GenerationUnavailableError.
 */
export class ProviderError extends EngineError {
  readonly kind: ProviderErrorKind;
  readonly status?: number;

  constructor(kind: ProviderErrorKind, message: string, status?: number, cause?: unknown) {
    super('PROVIDER_ERROR', message, { cause });
    this.kind = kind;
    this.status = status;
  }

  get transient(): boolean {
    return this.kind === 'timeout' || this.kind === 'server';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
