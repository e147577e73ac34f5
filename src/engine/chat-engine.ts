/**
 * Chat Engine
 *
 * One request: classify, check the catalog, read memory, try the cache,
 * route, assemble, generate with tier fallback, validate, then persist
 * memory and cache. Nothing thrown inside the pipeline reaches the caller;
 * the worst outcome is the localized technical-difficulty reply.
 */

import type { Logger } from 'pino'
import type { ClassificationResult, Tier } from '../types'
import type { EngineConfig } from '../config/schema'
import type { CatalogIndex } from '../catalog/catalog-index'
import type { ConversationMemory, MemorySnapshot } from '../memory/conversation-memory'
import type { SemanticCache } from '../cache/semantic-cache'
import type { Router } from '../routing/router'
import type { ResponseValidator } from '../validation/response-validator'
import type { AssembledContext, ContextAssembler } from '../context/context-assembler'
import type { GenerationGateway } from '../ai/generation-gateway'
import type { DecisionContext, DecisionLog } from '../observability/decision-log'
import type { Metrics } from '../observability'
import type { KeyValueStore } from '../storage/kv-store'
import { QueryEmbedding, type ResilientEmbedder } from '../embedding/resilient-embedder'
import { renderPrompt } from '../context/context-assembler'
import { classify } from '../classifier/query-classifier'
import { detectLanguage } from '../classifier/language'
import { ConfigurationError, RequestCancelledError, errorMessage } from '../errors'
import { generationParams } from './tiers'
import { REPLIES } from './replies'

export interface ChatRequest {
  merchantId: string
  customerId: string
  message: string
  signal?: AbortSignal
}

export type ReplyStatus = 'answered' | 'cached' | 'apology' | 'unavailable' | 'cancelled'

export interface ChatReply {
  text: string
  status: ReplyStatus
  /** Tier that produced the text */
  tier?: Tier
  fromCache: boolean
  fallbackUsed: boolean
  classification: ClassificationResult
}

export interface ChatEngineComponents {
  store: KeyValueStore
  embedder: ResilientEmbedder
  catalog: CatalogIndex
  memory: ConversationMemory
  cache: SemanticCache
  router: Router
  assembler: ContextAssembler
  validator: ResponseValidator
  generator: GenerationGateway
  decisions: DecisionLog
  metrics: Metrics
  logger: Logger
  config: EngineConfig
}

// Sections that make an answer specific to one customer
const PERSONAL_SECTIONS = new Set(['Personalization', 'History'])

export class ChatEngine {
  private logger: Logger

  constructor(private components: ChatEngineComponents) {
    this.logger = components.logger.child({ component: 'chat-engine' })
  }

  get decisions(): DecisionLog {
    return this.components.decisions
  }

  get config(): EngineConfig {
    return this.components.config
  }

  async handle(request: ChatRequest): Promise<ChatReply> {
    const reply = await this.process(request)
    this.components.metrics.increment('engine.reply', 1, { status: reply.status })
    return reply
  }

  /**
   * Replace a merchant's catalog; cached answers quoting the old one are dropped
   */
  async reindex(merchantId: string, items: readonly unknown[], signal?: AbortSignal): Promise<number> {
    const count = await this.components.catalog.reindex(merchantId, items, signal)
    await this.components.cache.clear(merchantId)
    return count
  }

  async forget(merchantId: string, customerId: string): Promise<void> {
    await this.components.memory.forget(merchantId, customerId)
  }

  async close(): Promise<void> {
    await this.components.store.close()
    this.logger.info('Chat engine closed')
  }

  private async process(request: ChatRequest): Promise<ChatReply> {
    const { merchantId, customerId, message, signal } = request
    const classification = classify(message)
    const replies = REPLIES[detectLanguage(message)]
    const context: DecisionContext = { merchantId, customerId, signals: classification.signals }
    const base = { fromCache: false, fallbackUsed: false, classification }

    try {
      if (signal?.aborted) throw new RequestCancelledError()

      if (!this.components.catalog.hasMerchant(merchantId)) {
        const error = new ConfigurationError(`No catalog indexed for merchant ${merchantId}`, { merchantId })
        this.components.decisions.record('catalog-missing', context, { error: error.message })
        return { ...base, text: replies.notAvailable, status: 'unavailable' }
      }

      const snapshot = await this.components.memory.snapshot(merchantId, customerId)
      const clarify = this.components.memory.shouldClarifyWith(snapshot.turns, message)
      if (clarify) {
        this.components.decisions.record('clarification-requested', context, { turns: snapshot.turns.length })
      }

      // Cache lookup, retrieval and cache write share one embedding of the message
      const embedding = new QueryEmbedding(message, this.components.embedder, { signal, context })
      const cacheable = classification.type !== 'follow_up' && !clarify
      if (cacheable) {
        const hit = await this.components.cache.lookup(merchantId, message, { signal, context, embedding })
        if (hit) {
          await this.remember(request, classification, hit.entry.response)
          return {
            ...base,
            text: hit.entry.response,
            status: 'cached',
            tier: hit.entry.metadata.tier,
            fromCache: true,
          }
        }
      }

      return await this.generate(request, classification, snapshot, { clarify, cacheable, embedding })
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        this.logger.info({ merchantId, customerId }, 'Request cancelled')
        return { ...base, text: '', status: 'cancelled' }
      }
      this.components.decisions.record('request-failed', context, { error: errorMessage(error) })
      return { ...base, text: replies.technicalDifficulty, status: 'apology' }
    }
  }

  private async generate(
    request: ChatRequest,
    classification: ClassificationResult,
    snapshot: MemorySnapshot,
    { clarify, cacheable, embedding }: { clarify: boolean; cacheable: boolean; embedding: QueryEmbedding }
  ): Promise<ChatReply> {
    const { merchantId, customerId, message, signal } = request
    const language = detectLanguage(message)
    const context: DecisionContext = { merchantId, customerId, signals: classification.signals }
    const { router, assembler, generator, validator } = this.components

    const tier = router.route(classification, { hasProfile: snapshot.hasProfile, clarify }, context)
    const built = new Map<Tier, AssembledContext>()

    const outcome = await router.executeWithFallback(
      tier,
      async current => {
        const assembled = await assembler.buildContext(merchantId, customerId, message, classification, {
          tier: current,
          snapshot,
          clarify,
          language,
          signal,
          context: { ...context, tier: current },
          embedding,
        })
        built.set(current, assembled)
        return generator.generate(renderPrompt(assembled.sections, message), {
          ...generationParams(current, classification.type),
          signal,
        })
      },
      { apology: REPLIES[language].apology, signal, context }
    )

    const base = { fallbackUsed: outcome.fallbackUsed, fromCache: false, classification }
    if (outcome.tier === null) {
      return { ...base, text: outcome.text, status: 'apology' }
    }

    const text = validator.validate(merchantId, outcome.text, { ...context, tier: outcome.tier })
    await this.remember(request, classification, text)

    const assembled = built.get(outcome.tier)
    const personal = assembled?.sections.some(section => PERSONAL_SECTIONS.has(section.name)) ?? true
    if (cacheable && !personal && assembled) {
      await this.components.cache.store(
        merchantId,
        message,
        text,
        { queryType: classification.type, tier: outcome.tier, itemIds: assembled.itemIds },
        { signal, context, embedding }
      )
    }

    return { ...base, text, status: 'answered', tier: outcome.tier }
  }

  private async remember(request: ChatRequest, classification: ClassificationResult, response: string): Promise<void> {
    const { merchantId, customerId, message } = request
    await this.components.memory.remember(merchantId, customerId, {
      query: message,
      response,
      queryType: classification.type,
      mentionedItems: this.components.catalog.findMentionedItems(merchantId, `${message}\n${response}`),
    })
  }
}
