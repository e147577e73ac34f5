/**
 * Conversation Memory
 *
 * Short-lived per-(merchant, customer) turn history stored as one JSON
 * document per key. Every write rewrites the document and resets its TTL,
 * so an idle conversation expires as a whole. Concurrent writers resolve
 * last-write-wins. Storage failures degrade to an empty history.
 */

import { z } from 'zod'
import type { Logger } from 'pino'
import type { ConversationTurn, CustomerProfile, TurnInput } from '../types'
import type { KeyValueStore } from '../storage/kv-store'
import type { MemoryConfig } from '../config/schema'
import { deriveProfile, extractTurnSignals, hasKnownProfile } from './signal-extraction'
import { hasBackReference } from '../classifier/query-classifier'
import { errorMessage } from '../errors'

const TurnSchema = z.object({
  query: z.string(),
  response: z.string(),
  timestamp: z.string(),
  signals: z.object({
    queryType: z.enum([
      'greeting', 'menu_query', 'specific_item', 'recommendation',
      'dietary', 'follow_up', 'price_inquiry', 'general',
    ]),
    mentionedItems: z.array(z.string()),
    customerName: z.string().optional(),
    dietary: z.array(z.string()),
    topics: z.array(z.string()),
  }),
})

const HistorySchema = z.array(TurnSchema)

export interface MemorySnapshot {
  turns: ConversationTurn[]
  profile: CustomerProfile
  hasProfile: boolean
}

export interface ConversationMemoryOptions {
  memory: MemoryConfig
  logger: Logger
  now?: () => number
}

export function memoryKey(merchantId: string, customerId: string): string {
  return `conv:${merchantId}:${customerId}`
}

/**
 * Item names mentioned across the last `turnCount` turns, newest first
 */
export function recentMentionedItems(turns: readonly ConversationTurn[], turnCount: number): string[] {
  const items: string[] = []
  for (const turn of turns.slice(-turnCount).reverse()) {
    for (const item of turn.signals.mentionedItems) {
      if (!items.includes(item)) items.push(item)
    }
  }
  return items
}

/**
 * Clarify when the query points back at something ("is it spicy?") and the
 * history cannot resolve it: nothing to point at, no item mentioned
 * recently, or the last turn is older than the staleness window
 */
export function needsClarification(
  turns: readonly ConversationTurn[],
  query: string,
  config: Pick<MemoryConfig, 'stalenessSeconds' | 'recentItemTurns'>,
  now: number
): boolean {
  if (!hasBackReference(query)) return false

  const last = turns[turns.length - 1]
  if (!last) return true
  if (recentMentionedItems(turns, config.recentItemTurns).length === 0) return true

  const lastAt = Date.parse(last.timestamp)
  if (Number.isNaN(lastAt)) return true
  return now - lastAt > config.stalenessSeconds * 1000
}

export class ConversationMemory {
  private logger: Logger
  private now: () => number

  constructor(
    private store: KeyValueStore,
    private options: ConversationMemoryOptions
  ) {
    this.logger = options.logger.child({ component: 'conversation-memory' })
    this.now = options.now ?? Date.now
  }

  /**
   * Append a turn, keep the most recent N, reset the key's TTL
   */
  async remember(merchantId: string, customerId: string, input: TurnInput): Promise<ConversationTurn> {
    const turn: ConversationTurn = {
      query: input.query,
      response: input.response,
      timestamp: input.timestamp ?? new Date(this.now()).toISOString(),
      signals: extractTurnSignals(input.query, input.queryType, input.mentionedItems),
    }

    const history = [...(await this.recall(merchantId, customerId)), turn]
      .slice(-this.options.memory.maxTurns)

    try {
      await this.store.setWithTTL(
        memoryKey(merchantId, customerId),
        JSON.stringify(history),
        this.options.memory.ttlSeconds
      )
    } catch (error) {
      this.logger.warn({ merchantId, customerId, error: errorMessage(error) }, 'Failed to persist turn')
    }

    return turn
  }

  /**
   * Stored turns, oldest first
   */
  async recall(merchantId: string, customerId: string): Promise<ConversationTurn[]> {
    let raw: string | null
    try {
      raw = await this.store.get(memoryKey(merchantId, customerId))
    } catch (error) {
      this.logger.warn({ merchantId, customerId, error: errorMessage(error) }, 'Failed to read history')
      return []
    }
    if (!raw) return []

    try {
      const parsed = HistorySchema.safeParse(JSON.parse(raw))
      if (parsed.success) return parsed.data.slice(-this.options.memory.maxTurns)
      this.logger.warn({ merchantId, customerId }, 'Discarding malformed history')
    } catch (error) {
      this.logger.warn({ merchantId, customerId, error: errorMessage(error) }, 'Discarding unparseable history')
    }
    return []
  }

  async profile(merchantId: string, customerId: string): Promise<CustomerProfile> {
    return deriveProfile(await this.recall(merchantId, customerId))
  }

  /**
   * History and derived profile in one read
   */
  async snapshot(merchantId: string, customerId: string): Promise<MemorySnapshot> {
    const turns = await this.recall(merchantId, customerId)
    const profile = deriveProfile(turns)
    return { turns, profile, hasProfile: hasKnownProfile(profile) }
  }

  async shouldClarify(merchantId: string, customerId: string, query: string): Promise<boolean> {
    return this.shouldClarifyWith(await this.recall(merchantId, customerId), query)
  }

  shouldClarifyWith(turns: readonly ConversationTurn[], query: string): boolean {
    return needsClarification(turns, query, this.options.memory, this.now())
  }

  async forget(merchantId: string, customerId: string): Promise<void> {
    try {
      await this.store.delete(memoryKey(merchantId, customerId))
    } catch (error) {
      this.logger.warn({ merchantId, customerId, error: errorMessage(error) }, 'Failed to drop history')
    }
  }
}
