import type { Language } from '../types'
import { normalizeText } from '../utils/text'

const EXPLICIT: Array<[RegExp, Language]> = [
  [/\b(?:en español|in spanish|habla español|spanish please)\b/, 'es'],
  [/\b(?:en français|in french|parlez français|french please)\b/, 'fr'],
  [/\b(?:in english|english please)\b/, 'en'],
]

const MARKERS: Record<Exclude<Language, 'en'>, ReadonlySet<string>> = {
  es: new Set(['hola', 'buenas', 'buenos', 'quiero', 'tiene', 'tienen', 'gracias', 'comida', 'platos', 'favor', 'precio', 'recomienda', 'cuánto', 'cuanto']),
  fr: new Set(['bonjour', 'bonsoir', 'je', 'voudrais', 'avez', 'vous', 'merci', 'plats', 'quels', 'recommandez', 'prix', 'combien']),
}

/**
 * Heuristic reply language; English unless Spanish or French markers win
 */
export function detectLanguage(text: string): Language {
  const lower = text.toLowerCase()
  for (const [pattern, language] of EXPLICIT) {
    if (pattern.test(lower)) return language
  }

  const words = normalizeText(text).split(' ')
  const es = words.filter(word => MARKERS.es.has(word)).length
  const fr = words.filter(word => MARKERS.fr.has(word)).length

  if (es > fr && es > 0) return 'es'
  if (fr > es && fr > 0) return 'fr'
  return 'en'
}

export const LANGUAGE_NAMES: Record<Language, string> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
}
