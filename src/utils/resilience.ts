/**
 * Resilience helpers
 *
 * Timeout with cancellation, and a circuit breaker that stops calling a
 * collaborator that keeps failing.
 */

import { RequestCancelledError } from '../errors'

export interface CircuitBreakerConfig {
  failureThreshold?: number
  successThreshold?: number
  timeout?: number
}

export type CircuitBreakerState = 'closed' | 'open' | 'half-open'

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker [${name}] is OPEN`)
    this.name = 'CircuitOpenError'
  }
}

/**
 * Circuit Breaker - Prevents cascading failures
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = 'closed'
  private failureCount = 0
  private successCount = 0
  private nextAttempt = 0
  private readonly failureThreshold: number
  private readonly successThreshold: number
  private readonly timeout: number

  constructor(
    private name: string,
    config: CircuitBreakerConfig = {},
    private now: () => number = Date.now
  ) {
    this.failureThreshold = config.failureThreshold ?? 5
    this.successThreshold = config.successThreshold ?? 1
    this.timeout = config.timeout ?? 60000 // 1 minute
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (this.now() < this.nextAttempt) {
        throw new CircuitOpenError(this.name)
      }
      // Try to transition to half-open
      this.state = 'half-open'
    }

    try {
      const result = await fn()
      this.onSuccess()
      return result
    } catch (error) {
      this.onFailure()
      throw error
    }
  }

  private onSuccess(): void {
    this.failureCount = 0

    if (this.state === 'half-open') {
      this.successCount++
      if (this.successCount >= this.successThreshold) {
        this.state = 'closed'
        this.successCount = 0
      }
    }
  }

  private onFailure(): void {
    this.failureCount++
    this.successCount = 0

    if (this.state === 'half-open' || this.failureCount >= this.failureThreshold) {
      this.open()
    }
  }

  private open(): void {
    this.state = 'open'
    this.nextAttempt = this.now() + this.timeout
  }

  getState(): CircuitBreakerState {
    return this.state
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/**
 * Execute with timeout
 *
 * The operation receives a signal that aborts when the timeout fires or the
 * caller's signal aborts. A caller abort rejects with RequestCancelledError,
 * a timeout with TimeoutError.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { signal?: AbortSignal; timeoutMessage?: string } = {}
): Promise<T> {
  const { signal: parent, timeoutMessage } = options
  if (parent?.aborted) {
    throw new RequestCancelledError()
  }

  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  let onParentAbort: (() => void) | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting: the race must settle with the timeout
      reject(new TimeoutError(timeoutMessage || `Operation timed out after ${timeoutMs}ms`))
      controller.abort()
    }, timeoutMs)
  })

  const cancelled = new Promise<never>((_, reject) => {
    if (!parent) return
    onParentAbort = () => {
      reject(new RequestCancelledError())
      controller.abort()
    }
    parent.addEventListener('abort', onParentAbort, { once: true })
  })

  try {
    return await Promise.race([fn(controller.signal), timeout, cancelled])
  } finally {
    clearTimeout(timer)
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort)
    }
  }
}
