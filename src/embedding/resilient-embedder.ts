/**
 * Resilient Embedder
 *
 * Fronts the remote embedding provider with a timeout and a circuit breaker.
 * Any provider failure degrades to local hash embeddings instead of failing
 * the request. Results carry their source: vectors from different sources
 * live in different spaces and are never compared with each other.
 */

import type { EmbeddingSource } from '../types'
import type { EmbeddingProvider } from './embedding-provider'
import { hashEmbedding } from './hash-embedding'
import { CircuitBreaker, withTimeout } from '../utils/resilience'
import type { DecisionContext, DecisionLog } from '../observability/decision-log'
import type { Metrics } from '../observability'
import { EmbeddingError, RequestCancelledError, errorMessage } from '../errors'

export interface EmbeddingBatch {
  vectors: number[][]
  source: EmbeddingSource
}

export interface ResilientEmbedderOptions {
  dimensions: number
  timeoutMs: number
  decisions?: DecisionLog
  metrics?: Metrics
  breakerFailureThreshold?: number
  breakerCooldownMs?: number
  now?: () => number
}

export interface EmbedOptions {
  signal?: AbortSignal
  context?: DecisionContext
}

export interface EmbeddedText {
  vector: number[]
  source: EmbeddingSource
}

/**
 * One text's embedding, computed on first use and shared by every later
 * caller within a request
 */
export class QueryEmbedding {
  private pending?: Promise<EmbeddedText>

  constructor(
    readonly text: string,
    private embedder: ResilientEmbedder,
    private options: EmbedOptions = {}
  ) {}

  resolve(): Promise<EmbeddedText> {
    if (!this.pending) {
      this.pending = this.embedder.embed(this.text, this.options)
    }
    return this.pending
  }
}

/**
 * The shared embedding when it was made for `text`, a fresh one otherwise
 */
export function embedQuery(
  embedder: ResilientEmbedder,
  text: string,
  shared: QueryEmbedding | undefined,
  options: EmbedOptions
): Promise<EmbeddedText> {
  return shared && shared.text === text ? shared.resolve() : embedder.embed(text, options)
}

export class ResilientEmbedder {
  readonly dimensions: number
  private breaker: CircuitBreaker

  /**
   * @param provider - remote provider, or null to run on local embeddings only
   */
  constructor(
    private provider: EmbeddingProvider | null,
    private options: ResilientEmbedderOptions
  ) {
    if (provider && provider.dimensions !== options.dimensions) {
      throw new EmbeddingError(
        `Provider dimensionality ${provider.dimensions} differs from configured ${options.dimensions}`
      )
    }
    this.dimensions = options.dimensions
    this.breaker = new CircuitBreaker(
      'embedding-provider',
      {
        failureThreshold: options.breakerFailureThreshold ?? 3,
        timeout: options.breakerCooldownMs ?? 30000,
      },
      options.now
    )
  }

  get hasProvider(): boolean {
    return this.provider !== null
  }

  /**
   * Embed texts, preferring the provider
   * Only caller cancellation is thrown; every other failure degrades
   */
  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingBatch> {
    const provider = this.provider
    if (!provider) {
      return { vectors: texts.map(text => this.local(text)), source: 'local' }
    }
    if (texts.length === 0) {
      return { vectors: [], source: 'provider' }
    }

    try {
      const vectors = await this.breaker.execute(() =>
        withTimeout(
          signal => provider.embedBatch(texts, signal),
          this.options.timeoutMs,
          {
            signal: options.signal,
            timeoutMessage: `Embedding timed out after ${this.options.timeoutMs}ms`,
          }
        )
      )
      return { vectors, source: 'provider' }
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error

      this.options.metrics?.increment('embedding.degraded')
      this.options.decisions?.record('embedding-degraded', options.context ?? {}, {
        texts: texts.length,
        error: errorMessage(error),
        breaker: this.breaker.getState(),
      })
      return { vectors: texts.map(text => this.local(text)), source: 'local' }
    }
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<EmbeddedText> {
    const { vectors, source } = await this.embedBatch([text], options)
    return { vector: vectors[0], source }
  }

  /**
   * Deterministic local vector of the configured dimensionality
   */
  local(text: string): number[] {
    return hashEmbedding(text, this.dimensions)
  }
}
