/**
 * Query Classifier
 *
 * Deterministic, rule-based categorization. Signals are collected
 * independently; the category comes from an ordered rule list where the
 * first match wins. The complexity score is the number of distinct signals,
 * with unmatched (general) queries floored at medium complexity.
 */

import type { ClassificationResult, QueryType, Signal } from '../types'
import { RESTRICTIONS, detectRestrictions } from '../catalog/dietary'
import * as P from './patterns'

export const GENERAL_MIN_COMPLEXITY = 2

const ALLERGENS: ReadonlySet<string> = new Set(
  RESTRICTIONS.filter(r => r.kind === 'allergen').map(r => r.name)
)

interface Rule {
  type: QueryType
  when: (signals: ReadonlySet<Signal>) => boolean
}

/**
 * Most specific first
 */
const RULES: readonly Rule[] = [
  { type: 'greeting', when: s => s.has('exact_greeting') },
  { type: 'dietary', when: s => s.has('dietary') || s.has('allergy') },
  { type: 'follow_up', when: s => s.has('follow_up') || s.has('back_reference') },
  { type: 'price_inquiry', when: s => s.has('price') },
  { type: 'recommendation', when: s => s.has('recommendation') },
  { type: 'menu_query', when: s => s.has('menu') },
  { type: 'specific_item', when: s => s.has('item_detail') },
]

function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some(pattern => pattern.test(text))
}

/**
 * Signals fired by a message, in declaration order, without duplicates
 */
export function detectSignals(message: string): Signal[] {
  const text = message.toLowerCase().trim()
  const bare = text.replace(/[\s!?.,]+$/, '')
  const words = bare.split(/\s+/).filter(Boolean)
  const restrictions = detectRestrictions(message)

  const fired: Array<[Signal, boolean]> = [
    ['exact_greeting', P.EXACT_GREETING.test(bare)],
    ['trivial_request', P.TRIVIAL_REQUEST.test(bare)],
    ['greeting_plus', P.GREETING_PREFIX.test(bare) && words.length > 3],
    ['dietary', restrictions.some(r => !ALLERGENS.has(r)) || P.DIETARY_WORDS.test(text)],
    ['allergy', restrictions.some(r => ALLERGENS.has(r)) || P.ALLERGY_WORDS.test(text)],
    ['multi_dietary', restrictions.length >= 2],
    ['back_reference', P.BACK_REFERENCE.test(text)],
    ['follow_up', matchesAny(P.FOLLOW_UP, text)],
    ['price', matchesAny(P.PRICE, text)],
    ['recommendation', matchesAny(P.RECOMMENDATION, text)],
    ['menu', P.MENU.test(text)],
    ['item_detail', matchesAny(P.ITEM_DETAIL, text)],
    ['educational', P.EDUCATIONAL.test(text)],
    ['personal', P.PERSONAL.test(text)],
    ['multi_part', matchesAny(P.MULTI_PART, text)],
    ['multiple_questions', (text.match(/\?/g) ?? []).length > 1],
    ['multi_sentence', (text.match(P.SENTENCE_END) ?? []).length > 1],
    ['long_query', message.trim().length > P.LONG_QUERY_CHARS],
  ]

  return fired.filter(([, hit]) => hit).map(([signal]) => signal)
}

/**
 * Classify a customer message; pure and idempotent
 */
export function classify(message: string): ClassificationResult {
  const signals = detectSignals(message)
  const set = new Set(signals)
  const type = RULES.find(rule => rule.when(set))?.type ?? 'general'

  const complexityScore = type === 'general'
    ? Math.max(signals.length, GENERAL_MIN_COMPLEXITY)
    : signals.length

  return { type, complexityScore, signals }
}

export function isTrivial(result: ClassificationResult): boolean {
  return result.signals.some(signal => P.TRIVIAL_SIGNALS.includes(signal))
}

/**
 * Ambiguous back-reference in a message ("is it spicy?", "the same", "how much is it")
 */
export function hasBackReference(message: string): boolean {
  return P.BACK_REFERENCE.test(message.toLowerCase())
}
