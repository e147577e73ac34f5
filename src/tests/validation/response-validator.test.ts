import { describe, it, expect, beforeEach } from 'vitest'
import { ResponseValidator, matchItem } from '../../validation/response-validator'
import { formatPrice, parsePrice } from '../../validation/price'
import { CatalogIndex } from '../../catalog/catalog-index'
import { ResilientEmbedder } from '../../embedding/resilient-embedder'
import { RetrievalConfigSchema } from '../../config/schema'
import { DecisionLog, InMemoryMetrics } from '../../observability'
import type { IndexedItem } from '../../types'
import { KeywordEmbeddingProvider, MERCHANT, SAMPLE_CATALOG, silentLogger } from '../utils/fixtures'

function indexedItem(itemId: string, name: string, price: number): IndexedItem {
  return {
    merchantId: MERCHANT,
    itemId,
    name,
    description: '',
    price,
    category: 'Mains',
    tags: [],
    ingredients: [],
    allergens: [],
    available: true,
    searchText: name,
    embedding: [],
    embeddingSource: 'local',
    indexedAt: '2024-06-01T12:00:00.000Z',
  }
}

describe('ResponseValidator', () => {
  let decisions: DecisionLog
  let metrics: InMemoryMetrics
  let validator: ResponseValidator

  beforeEach(async () => {
    const provider = new KeywordEmbeddingProvider()
    const catalog = new CatalogIndex(
      new ResilientEmbedder(provider, { dimensions: provider.dimensions, timeoutMs: 1000 }),
      { retrieval: RetrievalConfigSchema.parse({}), logger: silentLogger }
    )
    await catalog.reindex(MERCHANT, SAMPLE_CATALOG)

    decisions = new DecisionLog(silentLogger)
    metrics = new InMemoryMetrics()
    validator = new ResponseValidator(catalog, {
      validator: { priceTolerance: 0.1 },
      logger: silentLogger,
      decisions,
      metrics,
    })
  })

  it('should rewrite a drifted price to the catalog value', () => {
    expect(validator.validate(MERCHANT, '- Margherita Pizza ($14)')).toBe('- Margherita Pizza ($12)')

    const [event] = decisions.list({ kind: 'price-corrected' })
    expect(event.detail).toEqual({ itemId: 'p1', mentioned: '$14', actual: '$12' })
    expect(metrics.getCounter('validator.correction')).toBe(1)
  })

  it('should leave prices within tolerance alone', () => {
    expect(validator.validate(MERCHANT, '- Margherita Pizza ($12.50)')).toBe('- Margherita Pizza ($12.50)')
  })

  it('should keep cents when the mention had cents', () => {
    expect(validator.validate(MERCHANT, '* Tiramisu - $9.99')).toBe('* Tiramisu - $8.00')
  })

  it('should flag unknown items without changing the text', () => {
    const report = validator.inspect(MERCHANT, '- Dragon Roll Supreme ($22)')

    expect(report.text).toBe('- Dragon Roll Supreme ($22)')
    expect(report.unmatched).toEqual(['Dragon Roll Supreme'])
    const [event] = decisions.list({ kind: 'hallucination-candidate' })
    expect(event.detail).toEqual({ mention: 'Dragon Roll Supreme', line: 0 })
  })

  it('should restore the catalog name for a loose match', () => {
    expect(validator.validate(MERCHANT, '- Carbonara Spaghetti ($16)')).toBe('- Spaghetti Carbonara ($16)')
    expect(decisions.list({ kind: 'name-corrected' })).toHaveLength(1)
  })

  it('should check numbered lines and keep surrounding sentences', () => {
    const text = 'Here are some ideas:\n1. Grilled Salmon: $25\n- Margherita ($12)\nEnjoy!'

    const report = validator.inspect(MERCHANT, text)

    expect(report.text).toBe('Here are some ideas:\n1. Grilled Salmon: $22\n- Margherita ($12)\nEnjoy!')
    expect(report.checked).toBe(2)
    expect(report.corrections).toEqual([
      { kind: 'price', line: 1, before: '$25', after: '$22', itemId: 'm1' },
    ])
  })

  it('should strip template placeholders', () => {
    expect(validator.validate(MERCHANT, "Welcome back, [Customer's Name]!")).toBe('Welcome back!')
  })

  it('should leave text alone for a merchant without a catalog', () => {
    expect(validator.validate('unknown', '- Margherita Pizza ($14)')).toBe('- Margherita Pizza ($14)')
  })
})

describe('matchItem', () => {
  const items = [indexedItem('c1', 'Chicken Curry', 15), indexedItem('c2', 'Chicken Tikka', 16)]

  it('should report several containment candidates as ambiguous', () => {
    const result = matchItem('Chicken', items)

    expect(result.kind).toBe('ambiguous')
  })

  it('should match an exact name regardless of case and punctuation', () => {
    const result = matchItem('chicken-curry', items)

    expect(result).toEqual({ kind: 'match', item: items[0], method: 'exact' })
  })
})

describe('price helpers', () => {
  it('should parse thousands separators and cents', () => {
    expect(parsePrice('$1,500.00')).toBe(1500)
    expect(parsePrice('$ 9.5')).toBe(9.5)
    expect(parsePrice('twelve dollars')).toBeNull()
  })

  it('should format whole and fractional prices', () => {
    expect(formatPrice(12)).toBe('$12.00')
    expect(formatPrice(12, { whole: true })).toBe('$12')
    expect(formatPrice(1500)).toBe('$1,500.00')
  })
})
