/**
 * Context Assembler
 *
 * Builds the labelled sections a prompt is rendered from. Section order is
 * fixed and each section has its own character cap, so what the model sees
 * is bounded regardless of history length or catalog size. The Light tier
 * gets instructions only; MemoryAware and Heavy add memory and retrieval and
 * differ in how many catalog items they pull.
 */

import type { Logger } from 'pino'
import type { ClassificationResult, ConversationTurn, CustomerProfile, IndexedItem, Language, SearchHit, Tier } from '../types'
import type { MemoryConfig, RetrievalConfig } from '../config/schema'
import type { CatalogIndex } from '../catalog/catalog-index'
import type { ConversationMemory, MemorySnapshot } from '../memory/conversation-memory'
import type { DecisionContext } from '../observability/decision-log'
import type { QueryEmbedding } from '../embedding/resilient-embedder'
import type { Prompt } from '../ai/generation-gateway'
import { detectRestrictions } from '../catalog/dietary'
import { isTrivial } from '../classifier/query-classifier'
import { LANGUAGE_NAMES } from '../classifier/language'
import { formatPrice } from '../validation/price'
import { truncate } from '../utils/text'
import {
  CLARIFY_DIRECTIVE,
  GROUNDING_RULES,
  PERSONALIZE_DIRECTIVE,
  ROLE,
  TYPE_GUIDANCE,
} from './prompts'

export type SectionName = 'Personalization' | 'History' | 'CatalogItems' | 'DietaryFilter' | 'Instructions'

export interface ContextSection {
  name: SectionName
  content: string
}

export const SECTION_ORDER: readonly SectionName[] = [
  'Personalization',
  'History',
  'CatalogItems',
  'DietaryFilter',
  'Instructions',
]

export const SECTION_CAPS: Record<SectionName, number> = {
  Personalization: 400,
  History: 1200,
  CatalogItems: 3000,
  DietaryFilter: 1500,
  Instructions: 1500,
}

const SECTION_LABELS: Record<SectionName, string> = {
  Personalization: 'CUSTOMER',
  History: 'RECENT CONVERSATION',
  CatalogItems: 'AVAILABLE ITEMS',
  DietaryFilter: 'ITEMS MATCHING DIETARY NEEDS',
  Instructions: 'GUIDELINES',
}

const HISTORY_RESPONSE_CHARS = 150
const DESCRIPTION_CHARS = 120
const MAX_ITEMS = 10

export interface BuildContextOptions {
  tier: Tier
  /** Memory already read for routing; read here when absent */
  snapshot?: MemorySnapshot
  clarify?: boolean
  language?: Language
  signal?: AbortSignal
  context?: DecisionContext
  embedding?: QueryEmbedding
}

export interface AssembledContext {
  sections: ContextSection[]
  /** Catalog items placed in the prompt */
  itemIds: string[]
}

export interface ContextAssemblerOptions {
  retrieval: RetrievalConfig
  memory: MemoryConfig
  logger: Logger
}

export class ContextAssembler {
  private logger: Logger

  constructor(
    private catalog: CatalogIndex,
    private memory: ConversationMemory,
    private options: ContextAssemblerOptions
  ) {
    this.logger = options.logger.child({ component: 'context-assembler' })
  }

  async buildContext(
    merchantId: string,
    customerId: string,
    query: string,
    classification: ClassificationResult,
    options: BuildContextOptions
  ): Promise<AssembledContext> {
    const { tier } = options
    const language = options.language ?? 'en'
    const clarify = options.clarify ?? false

    if (tier === 'light') {
      return {
        sections: [section('Instructions', instructions(classification, language, clarify, false))],
        itemIds: [],
      }
    }

    const snapshot = options.snapshot ?? await this.memory.snapshot(merchantId, customerId)
    const sections: ContextSection[] = []
    const itemIds = new Set<string>()

    if (snapshot.hasProfile) {
      sections.push(section('Personalization', personalization(snapshot.profile)))
    }

    const history = snapshot.turns.slice(-this.options.memory.historyTurns)
    if (history.length > 0) {
      sections.push(section('History', formatHistory(history)))
    }

    if (classification.type !== 'greeting' && !isTrivial(classification)) {
      const k = tier === 'heavy' ? this.options.retrieval.topK : this.options.retrieval.lightTopK
      const hits = await this.catalog.search(merchantId, query, Math.min(k, MAX_ITEMS), undefined, {
        signal: options.signal,
        context: options.context,
        embedding: options.embedding,
      })
      if (hits.length > 0) {
        sections.push(section('CatalogItems', formatHits(hits)))
        hits.forEach(hit => itemIds.add(hit.item.itemId))
      }
    }

    const signals = new Set(classification.signals)
    if (signals.has('dietary') || signals.has('allergy')) {
      const restrictions = unique([...detectRestrictions(query), ...snapshot.profile.requirements])
      if (restrictions.length > 0) {
        const safe = this.catalog.filterByRestrictions(merchantId, restrictions, MAX_ITEMS)
        sections.push(section('DietaryFilter', formatDietary(restrictions, safe)))
        safe.forEach(item => itemIds.add(item.itemId))
      }
    }

    sections.push(section('Instructions', instructions(classification, language, clarify, snapshot.hasProfile)))

    this.logger.debug(
      { merchantId, tier, sections: sections.map(s => s.name), items: itemIds.size },
      'Context assembled'
    )
    return { sections: orderSections(sections), itemIds: [...itemIds] }
  }
}

/**
 * System prompt from the sections in order; the query is the user message
 */
export function renderPrompt(sections: readonly ContextSection[], query: string): Prompt {
  const context = orderSections(sections).filter(s => s.name !== 'Instructions')
  const guidelines = sections.find(s => s.name === 'Instructions')

  const parts = [ROLE]
  if (context.length > 0) {
    parts.push(
      [
        '=== CONTEXT START ===',
        '(Background information for this conversation. Do not mention it explicitly.)',
        ...context.map(s => `--- ${SECTION_LABELS[s.name]} ---\n${s.content}`),
        '=== CONTEXT END ===',
      ].join('\n\n')
    )
  }
  if (guidelines) {
    parts.push(`--- ${SECTION_LABELS.Instructions} ---\n${guidelines.content}`)
  }

  return { system: parts.join('\n\n'), user: query }
}

function section(name: SectionName, content: string): ContextSection {
  return { name, content: truncate(content, SECTION_CAPS[name]) }
}

function orderSections(sections: readonly ContextSection[]): ContextSection[] {
  return [...sections].sort((a, b) => SECTION_ORDER.indexOf(a.name) - SECTION_ORDER.indexOf(b.name))
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)]
}

function personalization(profile: CustomerProfile): string {
  const lines: string[] = []
  if (profile.name) lines.push(`Name: ${profile.name}`)
  if (profile.requirements.length > 0) lines.push(`Dietary requirements: ${profile.requirements.join(', ')}`)
  if (profile.interests.length > 0) lines.push(`Interests: ${profile.interests.join(', ')}`)
  if (profile.pricePreference) lines.push(`Price preference: ${profile.pricePreference}`)
  return lines.join('\n')
}

function formatHistory(turns: readonly ConversationTurn[]): string {
  return turns
    .map(turn => `Customer: ${turn.query}\nAssistant: ${truncate(turn.response, HISTORY_RESPONSE_CHARS)}`)
    .join('\n')
}

export function formatItem(item: IndexedItem): string {
  let line = `- ${item.name} (${formatPrice(item.price)})`
  if (item.category) line += ` [${item.category}]`
  if (item.description) line += `: ${truncate(item.description, DESCRIPTION_CHARS)}`
  if (item.allergens.length > 0) line += ` Allergens: ${item.allergens.join(', ')}.`
  return line
}

function formatHits(hits: readonly SearchHit[]): string {
  return hits.map(hit => formatItem(hit.item)).join('\n')
}

function formatDietary(restrictions: readonly string[], items: readonly IndexedItem[]): string {
  const header = `Restrictions: ${restrictions.join(', ')}`
  if (items.length === 0) {
    return `${header}\nNo listed items are known to satisfy all of these restrictions.`
  }
  return [header, ...items.map(item => `- ${item.name} (${formatPrice(item.price)})`)].join('\n')
}

function instructions(
  classification: ClassificationResult,
  language: Language,
  clarify: boolean,
  personalized: boolean
): string {
  const lines = GROUNDING_RULES.map(rule => `- ${rule}`)
  lines.push(`- ${TYPE_GUIDANCE[classification.type]}`)
  if (personalized) lines.push(`- ${PERSONALIZE_DIRECTIVE}`)
  if (clarify) lines.push(`- ${CLARIFY_DIRECTIVE}`)
  lines.push(`- Reply in ${LANGUAGE_NAMES[language]}.`)
  return lines.join('\n')
}
