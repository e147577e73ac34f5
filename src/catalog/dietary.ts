/**
 * Dietary lexicon
 *
 * Restrictions come in two kinds. Diets (vegetarian, vegan ...) are detected
 * whenever named. Allergens are detected from an explicit phrase ("nut
 * allergy", "gluten free") or from a term in an avoidance context
 * ("allergic to nuts", "without cheese"), so "fish tacos" is not a restriction.
 */

import { z } from 'zod'
import lexiconData from '../data/dietary-lexicon.json'
import { tokenize } from '../utils/text'

const RestrictionSchema = z.object({
  kind: z.enum(['diet', 'allergen']),
  aliases: z.array(z.string()),
  terms: z.array(z.string()),
  exclude: z.array(z.string()).min(1),
})

const LexiconSchema = z.record(RestrictionSchema)

export type RestrictionKind = z.infer<typeof RestrictionSchema>['kind']

export interface Restriction {
  name: string
  kind: RestrictionKind
  aliases: string[][]
  terms: string[][]
  exclude: string[][]
}

const AVOID_BEFORE: ReadonlySet<string> = new Set([
  'allergic', 'allergy', 'without', 'no', 'avoid', 'avoiding', 'intolerant', 'sensitive', 'free',
])
const AVOID_AFTER: ReadonlySet<string> = new Set(['free', 'allergy', 'intolerance', 'intolerant'])
const AVOID_WINDOW = 4

function phrases(list: string[]): string[][] {
  return list.map(tokenize).filter(tokens => tokens.length > 0)
}

export const RESTRICTIONS: readonly Restriction[] = Object.entries(LexiconSchema.parse(lexiconData))
  .map(([name, entry]) => ({
    name,
    kind: entry.kind,
    aliases: phrases(entry.aliases),
    terms: phrases(entry.terms),
    exclude: phrases(entry.exclude),
  }))

const BY_NAME = new Map(RESTRICTIONS.map(r => [r.name, r]))

/**
 * Start indexes of `phrase` inside `tokens`
 */
function occurrences(tokens: string[], phrase: string[]): number[] {
  const found: number[] = []
  for (let i = 0; i + phrase.length <= tokens.length; i++) {
    if (phrase.every((word, j) => tokens[i + j] === word)) found.push(i)
  }
  return found
}

function hasPhrase(tokens: string[], phrase: string[]): boolean {
  return occurrences(tokens, phrase).length > 0
}

function inAvoidanceContext(tokens: string[], start: number, length: number): boolean {
  const before = tokens.slice(Math.max(0, start - AVOID_WINDOW), start)
  const after = tokens[start + length]
  return before.some(t => AVOID_BEFORE.has(t)) || (after !== undefined && AVOID_AFTER.has(after))
}

/**
 * Canonical restriction names stated in a text, in lexicon order
 */
export function detectRestrictions(text: string): string[] {
  const tokens = tokenize(text)
  return RESTRICTIONS
    .filter(restriction =>
      restriction.aliases.some(alias => hasPhrase(tokens, alias)) ||
      restriction.terms.some(term =>
        occurrences(tokens, term).some(start => inAvoidanceContext(tokens, start, term.length))
      )
    )
    .map(restriction => restriction.name)
}

export function getRestriction(name: string): Restriction | undefined {
  return BY_NAME.get(name) ?? RESTRICTIONS.find(r => r.aliases.some(alias => alias.join(' ') === tokenize(name).join(' ')))
}

/**
 * True when any excluded substance of the restriction appears in the text
 */
export function violatesRestriction(text: string, restriction: Restriction): boolean {
  const tokens = tokenize(text)
  return restriction.exclude.some(term => hasPhrase(tokens, term))
}
