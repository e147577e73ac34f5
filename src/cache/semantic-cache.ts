/**
 * Semantic Cache
 *
 * Responses keyed by query-embedding similarity rather than exact text.
 * A merchant's entries live in one JSON document; each entry carries its
 * own creation time, so age is checked per entry while the document TTL
 * only bounds how long an idle merchant's cache survives.
 *
 * An entry only answers queries naming the same dietary restrictions it was
 * stored under, however close the embeddings.
 *
 * Strictly advisory: read and write failures are logged and reported as a
 * miss. Only caller cancellation propagates.
 */

import { z } from 'zod'
import { v4 as uuidv4 } from 'uuid'
import type { Logger } from 'pino'
import type { CacheEntry, CacheEntryMetadata, CacheHit } from '../types'
import type { KeyValueStore } from '../storage/kv-store'
import type { CacheConfig } from '../config/schema'
import { embedQuery, type QueryEmbedding, type ResilientEmbedder } from '../embedding/resilient-embedder'
import type { DecisionContext, DecisionLog } from '../observability/decision-log'
import type { Metrics } from '../observability'
import { cosineSimilarity } from '../embedding/vector'
import { detectRestrictions } from '../catalog/dietary'
import { RequestCancelledError, errorMessage } from '../errors'

const CacheEntrySchema = z.object({
  id: z.string(),
  merchantId: z.string(),
  embedding: z.array(z.number()),
  embeddingSource: z.enum(['provider', 'local']),
  query: z.string(),
  response: z.string(),
  metadata: z.object({
    queryType: z.enum([
      'greeting', 'menu_query', 'specific_item', 'recommendation',
      'dietary', 'follow_up', 'price_inquiry', 'general',
    ]),
    tier: z.enum(['light', 'memory-aware', 'heavy']),
    itemIds: z.array(z.string()),
    restrictions: z.array(z.string()).default([]),
  }),
  createdAt: z.number(),
})

const CacheDocumentSchema = z.array(CacheEntrySchema)

export interface SemanticCacheOptions {
  cache: CacheConfig
  logger: Logger
  decisions?: DecisionLog
  metrics?: Metrics
  now?: () => number
}

export interface CacheCallOptions {
  signal?: AbortSignal
  context?: DecisionContext
  embedding?: QueryEmbedding
}

// Order-insensitive key of the dietary restrictions a query names
function restrictionKey(restrictions: readonly string[]): string {
  return [...new Set(restrictions)].sort().join(',')
}

export function cacheKey(merchantId: string): string {
  return `semcache:${merchantId}`
}

export class SemanticCache {
  private logger: Logger
  private now: () => number

  constructor(
    private kv: KeyValueStore,
    private embedder: ResilientEmbedder,
    private options: SemanticCacheOptions
  ) {
    this.logger = options.logger.child({ component: 'semantic-cache' })
    this.now = options.now ?? Date.now
  }

  get enabled(): boolean {
    return this.options.cache.enabled
  }

  /**
   * Most similar live entry at or above the similarity threshold
   */
  async lookup(merchantId: string, queryText: string, options: CacheCallOptions = {}): Promise<CacheHit | null> {
    if (!this.enabled) return null

    try {
      const entries = await this.load(merchantId)
      if (entries.length === 0) {
        this.options.metrics?.increment('cache.miss')
        return null
      }

      const restrictions = restrictionKey(detectRestrictions(queryText))
      const candidates = entries.filter(entry => restrictionKey(entry.metadata.restrictions) === restrictions)
      if (candidates.length === 0) {
        this.options.metrics?.increment('cache.miss')
        return null
      }

      const { vector, source } = await embedQuery(this.embedder, queryText, options.embedding, {
        signal: options.signal,
        context: { merchantId, ...options.context },
      })
      const localQuery = source === 'local' ? vector : this.embedder.local(queryText)

      let best: CacheHit | null = null
      for (const entry of candidates) {
        const similarity = this.similarity(entry, vector, source, localQuery)
        if (similarity === null || similarity < this.options.cache.similarityThreshold) continue
        if (!best || similarity > best.similarity) {
          best = { entry, similarity, ageMs: this.now() - entry.createdAt }
        }
      }

      if (!best) {
        this.options.metrics?.increment('cache.miss')
        return null
      }

      this.options.metrics?.increment('cache.hit')
      this.options.decisions?.record('cache-hit', { merchantId, ...options.context }, {
        entryId: best.entry.id,
        similarity: Number(best.similarity.toFixed(4)),
        ageMs: best.ageMs,
      })
      return best
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error
      this.degraded('lookup', merchantId, error, options.context)
      return null
    }
  }

  /**
   * Persist a response; the oldest entries are evicted past the per-merchant bound
   */
  async store(
    merchantId: string,
    queryText: string,
    response: string,
    metadata: Omit<CacheEntryMetadata, 'restrictions'>,
    options: CacheCallOptions = {}
  ): Promise<CacheEntry | null> {
    if (!this.enabled || response.trim().length === 0) return null

    try {
      const { vector, source } = await embedQuery(this.embedder, queryText, options.embedding, {
        signal: options.signal,
        context: { merchantId, ...options.context },
      })

      const entry: CacheEntry = {
        id: uuidv4(),
        merchantId,
        embedding: vector,
        embeddingSource: source,
        query: queryText,
        response,
        metadata: { ...metadata, restrictions: detectRestrictions(queryText) },
        createdAt: this.now(),
      }

      const entries = [...(await this.load(merchantId)), entry]
      const overflow = entries.length - this.options.cache.maxEntriesPerMerchant
      const kept = overflow > 0 ? entries.slice(overflow) : entries

      await this.kv.setWithTTL(cacheKey(merchantId), JSON.stringify(kept), this.options.cache.ttlSeconds)
      this.logger.debug({ merchantId, entryId: entry.id, size: kept.length, evicted: Math.max(0, overflow) }, 'Response cached')
      return entry
    } catch (error) {
      if (error instanceof RequestCancelledError) throw error
      this.degraded('store', merchantId, error, options.context)
      return null
    }
  }

  /**
   * Drop every entry for a merchant
   */
  async clear(merchantId: string): Promise<void> {
    try {
      await this.kv.delete(cacheKey(merchantId))
      this.logger.info({ merchantId }, 'Cache cleared')
    } catch (error) {
      this.degraded('clear', merchantId, error)
    }
  }

  /**
   * Live entries, oldest first; expired ones are pruned on the next write
   */
  async entries(merchantId: string): Promise<CacheEntry[]> {
    return this.load(merchantId)
  }

  private async load(merchantId: string): Promise<CacheEntry[]> {
    const raw = await this.kv.get(cacheKey(merchantId))
    if (!raw) return []

    const parsed = CacheDocumentSchema.safeParse(JSON.parse(raw))
    if (!parsed.success) {
      this.logger.warn({ merchantId }, 'Discarding malformed cache document')
      return []
    }

    const ttlMs = this.options.cache.ttlSeconds * 1000
    const now = this.now()
    return parsed.data.filter(entry => now - entry.createdAt < ttlMs)
  }

  /**
   * Provider vectors are only comparable with provider vectors; local
   * entries can always be compared through the local query vector
   */
  private similarity(
    entry: CacheEntry,
    vector: number[],
    source: CacheEntry['embeddingSource'],
    localQuery: number[]
  ): number | null {
    if (entry.embeddingSource === source) return cosineSimilarity(vector, entry.embedding)
    if (entry.embeddingSource === 'local') return cosineSimilarity(localQuery, entry.embedding)
    return null
  }

  private degraded(operation: string, merchantId: string, error: unknown, context: DecisionContext = {}): void {
    this.options.metrics?.increment('cache.degraded')
    const detail = { operation, error: errorMessage(error) }
    if (this.options.decisions) {
      this.options.decisions.record('cache-degraded', { merchantId, ...context }, detail)
    } else {
      this.logger.warn({ merchantId, ...detail }, 'Cache unavailable, continuing without it')
    }
  }
}
