/**
 * Response Validator
 *
 * Best-effort grounding check on generated text. List-style lines naming an
 * item are matched against the merchant's catalog: drifted prices and
 * loosely matched names are rewritten to catalog values, unknown items are
 * recorded as hallucination candidates and left in place. Sentences are
 * never removed.
 */

import type { Logger } from 'pino'
import type { IndexedItem } from '../types'
import type { ValidatorConfig } from '../config/schema'
import type { DecisionContext, DecisionLog } from '../observability/decision-log'
import type { Metrics } from '../observability'
import { PRICE_PATTERN, formatPrice, parsePrice, priceDrift } from './price'
import { normalizeText, tokenize } from '../utils/text'

const LIST_LINE = /^(\s*(?:[-*•·]|\d+[.)])\s+)(.+)$/
const NAME_END = /\s*(?:\(|:|\s[-–—]\s|\$)/
const MARKDOWN = /\*\*|__|`/g
const PLACEHOLDER = /\[(?:customer|client|guest|your|user)(?:'s)?(?: first| full)? name\]/gi
const MAX_NAME_WORDS = 8

export type MatchMethod = 'exact' | 'contains' | 'overlap'

export interface Correction {
  kind: 'price' | 'name' | 'placeholder'
  line: number
  before: string
  after: string
  itemId?: string
}

export interface ValidationReport {
  text: string
  corrections: Correction[]
  /** Names with no catalog counterpart */
  unmatched: string[]
  /** Names matching several catalog items equally well */
  ambiguous: string[]
  /** List lines checked against the catalog */
  checked: number
}

export interface CatalogReader {
  getItems(merchantId: string): IndexedItem[]
}

export interface ResponseValidatorOptions {
  validator: ValidatorConfig
  logger: Logger
  decisions?: DecisionLog
  metrics?: Metrics
}

export type MatchResult =
  | { kind: 'match'; item: IndexedItem; method: MatchMethod }
  | { kind: 'ambiguous'; candidates: IndexedItem[] }
  | { kind: 'none' }

/**
 * Exact normalized name, then a unique containment candidate, then the
 * best word overlap of at least min(2, words in the mention)
 */
export function matchItem(mention: string, items: readonly IndexedItem[]): MatchResult {
  const normalized = normalizeText(mention)
  if (!normalized) return { kind: 'none' }

  const exact = items.filter(item => normalizeText(item.name) === normalized)
  if (exact.length === 1) return { kind: 'match', item: exact[0], method: 'exact' }
  if (exact.length > 1) return { kind: 'ambiguous', candidates: exact }

  const padded = ` ${normalized} `
  const containing = items.filter(item => {
    const name = ` ${normalizeText(item.name)} `
    return name.includes(padded) || padded.includes(name)
  })
  if (containing.length === 1) return { kind: 'match', item: containing[0], method: 'contains' }
  if (containing.length > 1) return { kind: 'ambiguous', candidates: containing }

  const words = new Set(tokenize(mention))
  if (words.size === 0) return { kind: 'none' }
  const required = Math.min(2, words.size)

  let best: IndexedItem[] = []
  let bestOverlap = 0
  for (const item of items) {
    const overlap = tokenize(item.name).filter(word => words.has(word)).length
    if (overlap < required || overlap < bestOverlap) continue
    if (overlap > bestOverlap) {
      best = [item]
      bestOverlap = overlap
    } else {
      best.push(item)
    }
  }

  if (best.length === 1) return { kind: 'match', item: best[0], method: 'overlap' }
  if (best.length > 1) return { kind: 'ambiguous', candidates: best }
  return { kind: 'none' }
}

export class ResponseValidator {
  private logger: Logger

  constructor(
    private catalog: CatalogReader,
    private options: ResponseValidatorOptions
  ) {
    this.logger = options.logger.child({ component: 'response-validator' })
  }

  /**
   * Corrected text
   */
  validate(merchantId: string, responseText: string, context: DecisionContext = {}): string {
    return this.inspect(merchantId, responseText, context).text
  }

  inspect(merchantId: string, responseText: string, context: DecisionContext = {}): ValidationReport {
    const items = this.catalog.getItems(merchantId)
    const report: ValidationReport = { text: responseText, corrections: [], unmatched: [], ambiguous: [], checked: 0 }
    const decisionContext = { merchantId, ...context }

    const lines = responseText.split('\n').map((line, index) => {
      let current = this.stripPlaceholders(line, index, report)
      if (items.length > 0) {
        current = this.checkLine(current, index, items, report, decisionContext)
      }
      return current
    })

    report.text = lines.join('\n')

    if (report.corrections.length > 0) {
      this.options.metrics?.increment('validator.correction', report.corrections.length)
      this.logger.info({ merchantId, corrections: report.corrections.length }, 'Response corrected')
    }
    return report
  }

  private checkLine(
    line: string,
    index: number,
    items: readonly IndexedItem[],
    report: ValidationReport,
    context: DecisionContext
  ): string {
    const list = LIST_LINE.exec(line)
    if (!list) return line

    const [, prefix, rawBody] = list
    let body = rawBody
    const mention = body.replace(MARKDOWN, '').split(NAME_END)[0].trim().replace(/[.,;:]+$/, '')
    if (!mention || mention.split(/\s+/).length > MAX_NAME_WORDS) return line

    report.checked++
    const match = matchItem(mention, items)

    if (match.kind === 'none') {
      report.unmatched.push(mention)
      this.options.decisions?.record('hallucination-candidate', context, { mention, line: index })
      return line
    }
    if (match.kind === 'ambiguous') {
      report.ambiguous.push(mention)
      this.options.decisions?.record('ambiguous-item', context, {
        mention,
        candidates: match.candidates.map(item => item.name),
      })
      return line
    }

    const { item, method } = match
    const priceToken = PRICE_PATTERN.exec(body)?.[0]
    const mentioned = priceToken ? parsePrice(priceToken) : null

    if (priceToken && mentioned !== null && priceDrift(mentioned, item.price) > this.options.validator.priceTolerance) {
      const whole = !priceToken.includes('.') && Number.isInteger(item.price)
      const corrected = formatPrice(item.price, { whole })
      body = body.replace(priceToken, corrected)
      report.corrections.push({ kind: 'price', line: index, before: priceToken, after: corrected, itemId: item.itemId })
      this.options.decisions?.record('price-corrected', context, {
        itemId: item.itemId,
        mentioned: priceToken,
        actual: corrected,
      })
    }

    if (method === 'overlap' && normalizeText(mention) !== normalizeText(item.name) && body.includes(mention)) {
      body = body.replace(mention, item.name)
      report.corrections.push({ kind: 'name', line: index, before: mention, after: item.name, itemId: item.itemId })
      this.options.decisions?.record('name-corrected', context, { itemId: item.itemId, mentioned: mention })
    }

    return `${prefix}${body}`
  }

  private stripPlaceholders(line: string, index: number, report: ValidationReport): string {
    const found = line.match(PLACEHOLDER)
    if (!found) return line

    const stripped = line
      .replace(PLACEHOLDER, '')
      .replace(/ {2,}/g, ' ')
      .replace(/ +([!?.,;:])/g, '$1')
      .replace(/,([!?.])/g, '$1')
    for (const placeholder of found) {
      report.corrections.push({ kind: 'placeholder', line: index, before: placeholder, after: '' })
    }
    return stripped
  }
}
