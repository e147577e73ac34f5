/**
 * Catalog Index
 *
 * Per-merchant item vectors and metadata, searched by cosine similarity.
 * A reindex builds the merchant's new item set completely before swapping it
 * in, so a failed or invalid push leaves the previous catalog untouched and
 * a successful one leaves no stale items behind.
 */

import { z } from 'zod'
import type { Logger } from 'pino'
import type { CatalogItem, IndexedItem, SearchHit } from '../types'
import type { RetrievalConfig } from '../config/schema'
import { embedQuery, type QueryEmbedding, type ResilientEmbedder } from '../embedding/resilient-embedder'
import type { DecisionContext } from '../observability/decision-log'
import { cosineSimilarity } from '../embedding/vector'
import { buildDietaryText, buildSearchText } from './searchable-text'
import { getRestriction, violatesRestriction, type Restriction } from './dietary'
import { CatalogValidationError } from '../errors'
import { containsPhrase } from '../utils/text'

export const CatalogItemInputSchema = z.object({
  itemId: z.union([z.string().min(1), z.number()]).transform(String),
  name: z.string().trim().min(1),
  description: z.string().default(''),
  price: z.number().finite().nonnegative(),
  category: z.string().default('uncategorized'),
  tags: z.array(z.string()).default([]),
  ingredients: z.array(z.string()).default([]),
  allergens: z.array(z.string()).default([]),
  available: z.boolean().default(true),
})

export type CatalogItemInput = z.input<typeof CatalogItemInputSchema>

export interface IndexOptions {
  mode?: 'replace' | 'upsert'
  signal?: AbortSignal
}

export interface SearchOptions {
  signal?: AbortSignal
  context?: DecisionContext
  /** Embedding of the query already taken this request */
  embedding?: QueryEmbedding
}

export interface CatalogIndexOptions {
  retrieval: RetrievalConfig
  logger: Logger
}

export class CatalogIndex {
  private merchants = new Map<string, Map<string, IndexedItem>>()
  private localVectors = new WeakMap<IndexedItem, number[]>()
  private logger: Logger

  constructor(
    private embedder: ResilientEmbedder,
    private options: CatalogIndexOptions
  ) {
    this.logger = options.logger.child({ component: 'catalog-index' })
  }

  /**
   * Validate, embed and store a merchant's items
   * @returns number of items indexed
   */
  async indexItems(
    merchantId: string,
    items: readonly unknown[],
    options: IndexOptions = {}
  ): Promise<number> {
    const mode = options.mode ?? 'replace'
    const validated = this.validate(merchantId, items)

    const indexed = await this.embedItems(validated, options.signal)

    const next = mode === 'replace'
      ? new Map<string, IndexedItem>()
      : new Map(this.merchants.get(merchantId) ?? [])
    for (const item of indexed) {
      next.set(item.itemId, item)
    }
    this.merchants.set(merchantId, next)

    const local = indexed.filter(item => item.embeddingSource === 'local').length
    this.logger.info(
      { merchantId, mode, count: indexed.length, total: next.size, localEmbeddings: local },
      'Catalog indexed'
    )
    return indexed.length
  }

  /**
   * Full replacement of a merchant's catalog
   */
  reindex(merchantId: string, items: readonly unknown[], signal?: AbortSignal): Promise<number> {
    return this.indexItems(merchantId, items, { mode: 'replace', signal })
  }

  upsertItems(merchantId: string, items: readonly unknown[], signal?: AbortSignal): Promise<number> {
    return this.indexItems(merchantId, items, { mode: 'upsert', signal })
  }

  /**
   * Top-k available items with similarity >= minSimilarity, best first
   * An unknown merchant or no confident match yields an empty list
   */
  async search(
    merchantId: string,
    queryText: string,
    k: number = this.options.retrieval.topK,
    minSimilarity: number = this.options.retrieval.minSimilarity,
    options: SearchOptions = {}
  ): Promise<SearchHit[]> {
    const items = this.merchants.get(merchantId)
    if (!items || items.size === 0 || k <= 0) return []

    const { vector, source } = await embedQuery(this.embedder, queryText, options.embedding, {
      signal: options.signal,
      context: { merchantId, ...options.context },
    })
    const localQuery = source === 'local' ? vector : this.embedder.local(queryText)

    const hits: SearchHit[] = []
    for (const item of items.values()) {
      if (!item.available) continue
      const similarity = item.embeddingSource === source
        ? cosineSimilarity(vector, item.embedding)
        : cosineSimilarity(localQuery, this.localVector(item))
      if (similarity >= minSimilarity) {
        hits.push({ item, similarity })
      }
    }

    return hits
      .sort((a, b) => b.similarity - a.similarity || a.item.name.localeCompare(b.item.name))
      .slice(0, k)
  }

  /**
   * Available items containing none of the restricted substances
   * Unknown restriction names are ignored; with none known the result is empty
   */
  filterByRestrictions(merchantId: string, restrictions: readonly string[], limit = 10): IndexedItem[] {
    const known = restrictions
      .map(getRestriction)
      .filter((r): r is Restriction => r !== undefined)
    if (known.length === 0) return []

    return this.getItems(merchantId)
      .filter(item => item.available)
      .filter(item => {
        const text = buildDietaryText(item)
        return known.every(restriction => !violatesRestriction(text, restriction))
      })
      .slice(0, limit)
  }

  /**
   * Names of catalog items occurring in a text, longest name first
   */
  findMentionedItems(merchantId: string, text: string): string[] {
    return this.getItems(merchantId)
      .filter(item => containsPhrase(text, item.name))
      .map(item => item.name)
      .sort((a, b) => b.length - a.length)
  }

  getItems(merchantId: string): IndexedItem[] {
    return [...(this.merchants.get(merchantId)?.values() ?? [])]
  }

  getItem(merchantId: string, itemId: string): IndexedItem | undefined {
    return this.merchants.get(merchantId)?.get(itemId)
  }

  /**
   * True when the merchant has at least one indexed item
   */
  hasMerchant(merchantId: string): boolean {
    return (this.merchants.get(merchantId)?.size ?? 0) > 0
  }

  removeMerchant(merchantId: string): boolean {
    return this.merchants.delete(merchantId)
  }

  private validate(merchantId: string, items: readonly unknown[]): CatalogItem[] {
    if (!merchantId) {
      throw new CatalogValidationError('merchantId is required')
    }

    const issues: string[] = []
    const validated: CatalogItem[] = []
    const seen = new Set<string>()

    items.forEach((raw, index) => {
      const result = CatalogItemInputSchema.safeParse(raw)
      if (!result.success) {
        for (const issue of result.error.issues) {
          issues.push(`items[${index}].${issue.path.join('.')}: ${issue.message}`)
        }
        return
      }
      if (seen.has(result.data.itemId)) {
        issues.push(`items[${index}].itemId: duplicate id ${result.data.itemId}`)
        return
      }
      seen.add(result.data.itemId)
      validated.push({ merchantId, ...result.data })
    })

    if (issues.length > 0) {
      throw new CatalogValidationError(
        `Catalog for ${merchantId} rejected: ${issues.length} invalid item(s)`,
        issues
      )
    }
    return validated
  }

  private async embedItems(items: CatalogItem[], signal?: AbortSignal): Promise<IndexedItem[]> {
    const batchSize = this.options.retrieval.embeddingBatchSize
    const indexedAt = new Date().toISOString()
    const indexed: IndexedItem[] = []

    for (let start = 0; start < items.length; start += batchSize) {
      const batch = items.slice(start, start + batchSize)
      const texts = batch.map(buildSearchText)
      const { vectors, source } = await this.embedder.embedBatch(texts, {
        signal,
        context: { merchantId: batch[0].merchantId },
      })

      batch.forEach((item, i) => {
        indexed.push({
          ...item,
          searchText: texts[i],
          embedding: vectors[i],
          embeddingSource: source,
          indexedAt,
        })
      })
    }

    return indexed
  }

  private localVector(item: IndexedItem): number[] {
    if (item.embeddingSource === 'local') return item.embedding

    let vector = this.localVectors.get(item)
    if (!vector) {
      vector = this.embedder.local(item.searchText)
      this.localVectors.set(item, vector)
    }
    return vector
  }
}
