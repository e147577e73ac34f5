/**
 * Core domain types shared across the engine
 */

/**
 * A sellable catalog entry as pushed by the catalog source of truth
 */
export interface CatalogItem {
  merchantId: string
  itemId: string
  name: string
  description: string
  price: number
  category: string
  tags: string[]
  ingredients: string[]
  allergens: string[]
  available: boolean
}

/**
 * Catalog item plus its search vector, owned by the catalog index
 */
export interface IndexedItem extends CatalogItem {
  searchText: string
  embedding: number[]
  embeddingSource: EmbeddingSource
  indexedAt: string
}

/**
 * Remote provider vectors and local hash vectors are separate spaces
 */
export type EmbeddingSource = 'provider' | 'local'

export interface SearchHit {
  item: IndexedItem
  similarity: number
}

export type QueryType =
  | 'greeting'
  | 'menu_query'
  | 'specific_item'
  | 'recommendation'
  | 'dietary'
  | 'follow_up'
  | 'price_inquiry'
  | 'general'

/**
 * Names of the signal categories the classifier can fire
 */
export type Signal =
  | 'exact_greeting'
  | 'trivial_request'
  | 'greeting_plus'
  | 'dietary'
  | 'allergy'
  | 'multi_dietary'
  | 'back_reference'
  | 'follow_up'
  | 'price'
  | 'recommendation'
  | 'menu'
  | 'item_detail'
  | 'educational'
  | 'personal'
  | 'multi_part'
  | 'multiple_questions'
  | 'multi_sentence'
  | 'long_query'

export interface ClassificationResult {
  type: QueryType
  complexityScore: number
  signals: Signal[]
}

export type Tier = 'light' | 'memory-aware' | 'heavy'

export interface TurnSignals {
  queryType: QueryType
  mentionedItems: string[]
  customerName?: string
  dietary: string[]
  topics: string[]
}

export interface ConversationTurn {
  query: string
  response: string
  timestamp: string
  signals: TurnSignals
}

/**
 * Input to Conversation Memory; the memory fills in extracted signals
 */
export interface TurnInput {
  query: string
  response: string
  timestamp?: string
  queryType: QueryType
  mentionedItems?: string[]
}

export type PricePreference = 'budget' | 'premium'

/**
 * Derived from stored turns, never persisted on its own
 */
export interface CustomerProfile {
  name?: string
  requirements: string[]
  interests: string[]
  pricePreference?: PricePreference
}

export interface CacheEntryMetadata {
  queryType: QueryType
  tier: Tier
  itemIds: string[]
  /** Canonical dietary restrictions named by the cached query */
  restrictions: string[]
}

export interface CacheEntry {
  id: string
  merchantId: string
  embedding: number[]
  embeddingSource: EmbeddingSource
  query: string
  response: string
  metadata: CacheEntryMetadata
  createdAt: number
}

export interface CacheHit {
  entry: CacheEntry
  similarity: number
  ageMs: number
}

export type Language = 'en' | 'es' | 'fr'
