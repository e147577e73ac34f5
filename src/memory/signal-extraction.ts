/**
 * Per-turn signal extraction and profile derivation
 */

import { z } from 'zod'
import keywordData from '../data/topic-keywords.json'
import type { ConversationTurn, CustomerProfile, PricePreference, TurnSignals, QueryType } from '../types'
import { detectRestrictions } from '../catalog/dietary'
import { containsPhrase } from '../utils/text'

const KeywordsSchema = z.object({
  topics: z.record(z.array(z.string())),
  categories: z.array(z.string()),
  pricePreference: z.object({
    budget: z.array(z.string()),
    premium: z.array(z.string()),
  }),
  notNames: z.array(z.string()),
})

const KEYWORDS = KeywordsSchema.parse(keywordData)
const NOT_NAMES: ReadonlySet<string> = new Set(KEYWORDS.notNames)

const NAME_PATTERNS: readonly RegExp[] = [
  /\bmy name is\s+([a-z][a-z'-]*)/i,
  /\bcall me\s+([a-z][a-z'-]*)/i,
  // Self-introduction only counts with a capitalized word: "I'm Ana", not "I'm hungry"
  /\b(?:I'm|I am|Im)\s+([A-Z][a-zA-Z'-]*)/,
]

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

export function extractName(query: string): string | undefined {
  for (const pattern of NAME_PATTERNS) {
    const candidate = pattern.exec(query)?.[1]
    if (!candidate) continue
    const lower = candidate.toLowerCase()
    if (NOT_NAMES.has(lower) || detectRestrictions(lower).length > 0) continue
    return capitalize(candidate)
  }
  return undefined
}

/**
 * Topic and category keywords a query touches
 */
export function extractTopics(query: string): string[] {
  const lower = query.toLowerCase()
  const topics = Object.entries(KEYWORDS.topics)
    .filter(([, keywords]) => keywords.some(keyword => lower.includes(keyword)))
    .map(([topic]) => topic)
  const categories = KEYWORDS.categories.filter(category => containsPhrase(query, category))
  return [...topics, ...categories]
}

export function extractPricePreference(query: string): PricePreference | undefined {
  if (KEYWORDS.pricePreference.budget.some(word => containsPhrase(query, word))) return 'budget'
  if (KEYWORDS.pricePreference.premium.some(word => containsPhrase(query, word))) return 'premium'
  return undefined
}

export function extractTurnSignals(query: string, queryType: QueryType, mentionedItems: string[] = []): TurnSignals {
  const signals: TurnSignals = {
    queryType,
    mentionedItems: [...new Set(mentionedItems)],
    dietary: detectRestrictions(query),
    topics: extractTopics(query),
  }
  const name = extractName(query)
  if (name) signals.customerName = name
  return signals
}

/**
 * Profile derived from stored turns; later turns win for name and price
 * preference, interests are ranked by how often they came up
 */
export function deriveProfile(turns: readonly ConversationTurn[]): CustomerProfile {
  const requirements = new Set<string>()
  const interestCounts = new Map<string, number>()
  let name: string | undefined
  let pricePreference: PricePreference | undefined

  for (const turn of turns) {
    if (turn.signals.customerName) name = turn.signals.customerName
    turn.signals.dietary.forEach(restriction => requirements.add(restriction))
    for (const topic of turn.signals.topics) {
      interestCounts.set(topic, (interestCounts.get(topic) ?? 0) + 1)
    }
    pricePreference = extractPricePreference(turn.query) ?? pricePreference
  }

  // Map keeps first-seen order, so the stable sort breaks ties by first mention
  const interests = [...interestCounts.entries()]
    .sort((a, b) => b[1] - a[1])
    .map(([topic]) => topic)

  const profile: CustomerProfile = { requirements: [...requirements], interests }
  if (name) profile.name = name
  if (pricePreference) profile.pricePreference = pricePreference
  return profile
}

/**
 * A profile is known when it carries a name or a stated preference
 */
export function hasKnownProfile(profile: CustomerProfile): boolean {
  return Boolean(profile.name) || profile.requirements.length > 0 || profile.pricePreference !== undefined
}
