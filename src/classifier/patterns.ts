/**
 * Pattern tables for the query classifier
 * Matched against the lowercased, trimmed message
 */

import type { Signal } from '../types'

export const EXACT_GREETING = /^(?:hi|hello|hey|hiya|howdy|hola|bonjour|salut|buenas|good (?:morning|afternoon|evening))(?: there)?$/

export const TRIVIAL_REQUEST = /^(?:menu|show menu|the menu|hours|open|closed|phone|number|contact|where|location|address|delivery|takeout|pickup|thanks?|thank you|thx|bye|goodbye)$/

export const GREETING_PREFIX = /^(?:hi|hello|hey|hiya|good (?:morning|afternoon|evening))\b/

export const DIETARY_WORDS = /\b(?:dietary|diet|restrictions?)\b/

export const ALLERGY_WORDS = /\b(?:allerg\w*|intoleran\w*)/

export const BACK_REFERENCE = /\b(?:it|that one|this one|those|them|the same(?: one)?|the (?:first|second|third|last|other) one)\b/

export const FOLLOW_UP = [
  /^(?:not|but|however|although|what about|how about|and|also)\b/,
  /^(?:yes|no|okay|ok)\b.*\b(?:but|and)\b/,
  /\b(?:too|very|extremely|really)\s+(?:spicy|salty|sweet)\b/,
  /\b(?:something else|another one|instead)\b/,
]

export const PRICE = [
  /\b(?:prices?|costs?|how much|expensive|cheap(?:est)?|budget|affordable)\b/,
  /\$\s?\d/,
]

export const RECOMMENDATION = [
  /\b(?:recommend\w*|suggest\w*|what should)\b/,
  /\b(?:best|favou?rite|popular|signature)\b/,
  /^(?:something|anything)\s+(?:good|nice|special|romantic|light)\b/,
]

export const MENU = /\b(?:menu|options|dishes|selection|categories|what do you (?:have|serve|offer)|what (?:kind|kinds|sort) of)\b/

export const ITEM_DETAIL = [
  /\b(?:what(?:'s| is) in|ingredients?|made (?:with|of|from)|contains?|portion|serving size)\b/,
  /\b(?:pasta|pizza|salad|soup|dessert|appetizer|starter|entree|burger|steak|sandwich|wine|beer|cocktail|coffee)s?\b/,
]

export const EDUCATIONAL = /\b(?:explain|tell me about|what is|how do|authentic|traditional|difference between|compare|history|origin)\b/

export const PERSONAL = /\b(?:my name is|call me|i am|remember me|do you know me|how are you|nice to meet)\b/

export const MULTI_PART = [
  /\b(?:and|also|plus)\b.*\?.*\b(?:and|also|plus)\b/,
  /\b(?:first|second|third|finally)\b(?! one)/,
]

export const SENTENCE_END = /[.!?]+(?=\s|$)/g

export const LONG_QUERY_CHARS = 50

/**
 * Signals that mark a message the Light tier can answer from instructions alone
 */
export const TRIVIAL_SIGNALS: readonly Signal[] = ['exact_greeting', 'trivial_request']
