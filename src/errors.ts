/**
 * Error taxonomy
 *
 * Transient external failures are retried at most once through the router's
 * tier fallback. Data-integrity and storage-degraded outcomes are recorded as
 * decision events instead of being thrown at callers.
 */

export class TransientExternalError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message)
    this.name = 'TransientExternalError'
  }
}

export class GenerationError extends TransientExternalError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'GenerationError'
  }
}

export class EmbeddingError extends TransientExternalError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'EmbeddingError'
  }
}

export class StorageDegradedError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message)
    this.name = 'StorageDegradedError'
  }
}

/**
 * Invalid settings or a merchant with no indexed catalog
 */
export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    merchantId?: string
    errors?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

export class CatalogValidationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message)
    this.name = 'CatalogValidationError'
  }
}

/**
 * Raised when the caller cancels a request through its AbortSignal
 */
export class RequestCancelledError extends Error {
  constructor(message = 'Request was cancelled') {
    super(message)
    this.name = 'RequestCancelledError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
