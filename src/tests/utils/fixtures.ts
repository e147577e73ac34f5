/**
 * In-process stand-ins shared by the test suites
 */

import pino from 'pino'
import type { Logger } from 'pino'
import type { CatalogItemInput } from '../../catalog/catalog-index'
import type { EmbeddingProvider } from '../../embedding/embedding-provider'
import type { GenerationGateway, GenerationParams, Prompt } from '../../ai/generation-gateway'
import type { RedisCommands } from '../../storage/redis-kv-store'
import { EmbeddingError, GenerationError, RequestCancelledError } from '../../errors'

export const silentLogger: Logger = pino({ level: 'silent' })

export const MERCHANT = 'bistro'

export const SAMPLE_CATALOG: CatalogItemInput[] = [
  {
    itemId: 'p1',
    name: 'Margherita Pizza',
    description: 'Classic pizza with tomato, mozzarella and basil',
    price: 12,
    category: 'Pizza',
    tags: ['vegetarian'],
    ingredients: ['tomato', 'mozzarella', 'basil'],
    allergens: ['dairy', 'gluten'],
  },
  {
    itemId: 'p2',
    name: 'Spaghetti Carbonara',
    description: 'Spaghetti with guanciale, egg and pecorino',
    price: 16,
    category: 'Pasta',
    ingredients: ['spaghetti', 'guanciale', 'egg', 'pecorino'],
    allergens: ['gluten', 'eggs', 'dairy'],
  },
  {
    itemId: 's1',
    name: 'Garden Salad',
    description: 'Mixed greens with cucumber, tomato and lemon dressing',
    price: 9,
    category: 'Salad',
    tags: ['vegan', 'gluten free'],
    ingredients: ['lettuce', 'cucumber', 'tomato', 'lemon'],
  },
  {
    itemId: 'p3',
    name: 'Pesto Penne',
    description: 'Penne tossed in basil pesto with pine nuts',
    price: 14,
    category: 'Pasta',
    tags: ['vegetarian'],
    ingredients: ['penne', 'basil', 'pine nuts', 'parmesan'],
    allergens: ['nuts', 'dairy', 'gluten'],
  },
  {
    itemId: 'm1',
    name: 'Grilled Salmon',
    description: 'Atlantic salmon with lemon butter',
    price: 22,
    category: 'Mains',
    ingredients: ['salmon', 'lemon', 'butter'],
    allergens: ['fish', 'dairy'],
  },
  {
    itemId: 'd1',
    name: 'Tiramisu',
    description: 'Espresso-soaked ladyfingers with mascarpone',
    price: 8,
    category: 'Dessert',
    tags: ['vegetarian'],
    ingredients: ['ladyfingers', 'mascarpone', 'espresso', 'cocoa'],
    allergens: ['dairy', 'eggs', 'gluten'],
  },
  {
    itemId: 'b1',
    name: 'Vegan Buddha Bowl',
    description: 'Quinoa, roasted chickpeas, avocado and tahini',
    price: 13,
    category: 'Bowls',
    tags: ['vegan'],
    ingredients: ['quinoa', 'chickpeas', 'avocado', 'tahini'],
    allergens: ['sesame'],
  },
  {
    itemId: 'x1',
    name: 'Seasonal Soup',
    description: "Chef's soup of the day",
    price: 7,
    category: 'Soup',
    available: false,
  },
]

/**
 * One dimension per concept; texts touching the same concepts get the same
 * direction regardless of wording
 */
const CONCEPTS: readonly RegExp[] = [
  /\b(?:vegan|vegetarian|plant)/i,
  /\b(?:pizza|margherita)/i,
  /\b(?:pasta|spaghetti|penne|carbonara)/i,
  /\bsalad/i,
  /\b(?:dessert|tiramisu|cake)/i,
  /\b(?:fish|salmon|seafood)/i,
  /\b(?:menu|options|dishes)\b/i,
  /\b(?:bowl|quinoa)/i,
]

export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions = CONCEPTS.length
  calls = 0

  async embed(text: string): Promise<number[]> {
    return this.vector(text)
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++
    return texts.map(text => this.vector(text))
  }

  private vector(text: string): number[] {
    return CONCEPTS.map(concept => (concept.test(text) ? 1 : 0))
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  calls = 0

  constructor(readonly dimensions: number = 1536) {}

  async embed(): Promise<number[]> {
    this.calls++
    throw new EmbeddingError('provider unavailable')
  }

  async embedBatch(): Promise<number[][]> {
    this.calls++
    throw new EmbeddingError('provider unavailable')
  }
}

export interface GenerationCall {
  prompt: Prompt
  params: GenerationParams
}

type Reply = string | Error | ((call: GenerationCall) => string)

/**
 * Replays queued replies in order, then repeats the fallback reply
 */
export class FakeGenerationGateway implements GenerationGateway {
  calls: GenerationCall[] = []
  private queue: Reply[] = []

  constructor(private fallback: Reply = 'Happy to help!') {}

  enqueue(...replies: Reply[]): this {
    this.queue.push(...replies)
    return this
  }

  async generate(prompt: Prompt, params: GenerationParams): Promise<string> {
    if (params.signal?.aborted) throw new RequestCancelledError()
    const call = { prompt, params }
    this.calls.push(call)

    const reply = this.queue.shift() ?? this.fallback
    if (reply instanceof Error) throw reply
    return typeof reply === 'function' ? reply(call) : reply
  }
}

export const generationFailure = (): GenerationError => new GenerationError('model unavailable')

/**
 * Subset of Redis string commands over a map; `down` makes every call reject
 */
export class FakeRedis implements RedisCommands {
  data = new Map<string, { value: string; ttl: number }>()
  down = false
  closed = false

  async get(key: string): Promise<string | null> {
    this.check()
    return this.data.get(key)?.value ?? null
  }

  async setex(key: string, seconds: number, value: string): Promise<'OK'> {
    this.check()
    this.data.set(key, { value, ttl: seconds })
    return 'OK'
  }

  async del(key: string): Promise<number> {
    this.check()
    return this.data.delete(key) ? 1 : 0
  }

  async quit(): Promise<'OK'> {
    this.closed = true
    return 'OK'
  }

  private check(): void {
    if (this.down) throw new Error('connect ECONNREFUSED 127.0.0.1:6379')
  }
}

/**
 * Controllable clock
 */
export function createClock(start = Date.parse('2024-06-01T12:00:00.000Z')) {
  let current = start
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms
    },
  }
}
