/**
 * Text normalization shared by hashing, matching and signal extraction
 */

import stopwordList from '../data/stopwords.json'

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList)

/**
 * Lowercase, strip punctuation, collapse whitespace
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Naive English plural folding: dishes -> dish, berries -> berry, options -> option
 */
export function stem(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) return `${token.slice(0, -3)}y`
  if (token.length > 4 && /(?:ch|sh|ss|x|o)es$/.test(token)) return token.slice(0, -2)
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) return token.slice(0, -1)
  return token
}

/**
 * Content tokens: normalized, stopwords removed, plurals folded
 */
export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(' ')
    .filter(token => token.length > 1 && !STOPWORDS.has(token))
    .map(stem)
}

/**
 * Whole-phrase match on normalized text, so "nut" does not match "nutmeg"
 * but does match "pine nut"
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const haystack = ` ${normalizeText(text)} `
  const needle = normalizeText(phrase)
  if (!needle) return false
  return haystack.includes(` ${needle} `)
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, Math.max(0, maxLength - 3)).trimEnd()}...`
}
