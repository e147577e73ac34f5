import { describe, it, expect, beforeEach } from 'vitest'
import { ContextAssembler, SECTION_CAPS, renderPrompt } from '../../context/context-assembler'
import { CLARIFY_DIRECTIVE, PERSONALIZE_DIRECTIVE, ROLE } from '../../context/prompts'
import { CatalogIndex } from '../../catalog/catalog-index'
import { ConversationMemory } from '../../memory/conversation-memory'
import { ResilientEmbedder } from '../../embedding/resilient-embedder'
import { InMemoryKeyValueStore } from '../../storage/in-memory-kv-store'
import { MemoryConfigSchema, RetrievalConfigSchema } from '../../config/schema'
import { classify } from '../../classifier/query-classifier'
import { KeywordEmbeddingProvider, MERCHANT, SAMPLE_CATALOG, silentLogger } from '../utils/fixtures'

const retrieval = RetrievalConfigSchema.parse({})
const memoryConfig = MemoryConfigSchema.parse({})

describe('ContextAssembler', () => {
  let provider: KeywordEmbeddingProvider
  let memory: ConversationMemory
  let assembler: ContextAssembler

  beforeEach(async () => {
    provider = new KeywordEmbeddingProvider()
    const catalog = new CatalogIndex(
      new ResilientEmbedder(provider, { dimensions: provider.dimensions, timeoutMs: 1000 }),
      { retrieval, logger: silentLogger }
    )
    await catalog.reindex(MERCHANT, SAMPLE_CATALOG)
    memory = new ConversationMemory(new InMemoryKeyValueStore(), { memory: memoryConfig, logger: silentLogger })
    assembler = new ContextAssembler(catalog, memory, { retrieval, memory: memoryConfig, logger: silentLogger })
  })

  it('should give the light tier instructions only, without retrieval', async () => {
    const callsBefore = provider.calls

    const context = await assembler.buildContext(MERCHANT, 'c1', 'Hi', classify('Hi'), { tier: 'light' })

    expect(context.sections.map(section => section.name)).toEqual(['Instructions'])
    expect(context.itemIds).toEqual([])
    expect(provider.calls).toBe(callsBefore)
  })

  it('should add catalog items and the dietary filter for a dietary question', async () => {
    const query = 'What vegan options do you have?'

    const context = await assembler.buildContext(MERCHANT, 'c1', query, classify(query), { tier: 'memory-aware' })

    expect(context.sections.map(section => section.name)).toEqual(['CatalogItems', 'DietaryFilter', 'Instructions'])
    expect(context.sections[1].content).toBe(
      'Restrictions: vegan\n- Garden Salad ($9.00)\n- Vegan Buddha Bowl ($13.00)'
    )
    expect(context.itemIds).toEqual(['s1', 'p1', 'p3', 'd1', 'b1'])
  })

  it('should describe each retrieved item on its own line', async () => {
    const context = await assembler.buildContext(MERCHANT, 'c1', 'pizza?', classify('pizza?'), { tier: 'heavy' })

    expect(context.sections[0]).toEqual({
      name: 'CatalogItems',
      content: '- Margherita Pizza ($12.00) [Pizza]: Classic pizza with tomato, mozzarella and basil Allergens: dairy, gluten.',
    })
  })

  it('should include recent history and the profile in fixed order', async () => {
    await memory.remember(MERCHANT, 'c1', { query: 'My name is Ana', response: 'Hi Ana!', queryType: 'general' })
    await memory.remember(MERCHANT, 'c1', { query: 'q2', response: 'r2', queryType: 'general' })
    await memory.remember(MERCHANT, 'c1', { query: 'q3', response: 'x'.repeat(200), queryType: 'general' })
    await memory.remember(MERCHANT, 'c1', { query: 'q4', response: 'r4', queryType: 'general' })

    const context = await assembler.buildContext(MERCHANT, 'c1', 'Hello there', classify('Hello there'), {
      tier: 'memory-aware',
    })

    expect(context.sections.map(section => section.name)).toEqual(['Personalization', 'History', 'Instructions'])
    expect(context.sections[0].content).toBe('Name: Ana')
    expect(context.sections[1].content).toBe(
      `Customer: q2\nAssistant: r2\nCustomer: q3\nAssistant: ${'x'.repeat(147)}...\nCustomer: q4\nAssistant: r4`
    )
    expect(context.sections[2].content).toContain(PERSONALIZE_DIRECTIVE)
  })

  it('should add the clarification directive and the answer language', async () => {
    const query = '¿Es picante?'

    const context = await assembler.buildContext(MERCHANT, 'c1', query, classify(query), {
      tier: 'heavy',
      clarify: true,
      language: 'es',
    })
    const instructions = context.sections[context.sections.length - 1]

    expect(instructions.name).toBe('Instructions')
    expect(instructions.content).toContain(`- ${CLARIFY_DIRECTIVE}`)
    expect(instructions.content.endsWith('- Reply in Spanish.')).toBe(true)
  })

  it('should keep every section within its cap', async () => {
    for (let i = 0; i < 3; i++) {
      await memory.remember(MERCHANT, 'c1', { query: 'y'.repeat(600), response: 'ok', queryType: 'general' })
    }

    const query = 'What vegan options do you have?'
    const context = await assembler.buildContext(MERCHANT, 'c1', query, classify(query), { tier: 'heavy' })

    for (const section of context.sections) {
      expect(section.content.length).toBeLessThanOrEqual(SECTION_CAPS[section.name])
    }
  })
})

describe('renderPrompt', () => {
  it('should wrap context sections and end with the guidelines', () => {
    const prompt = renderPrompt(
      [
        { name: 'Instructions', content: '- Be brief.' },
        { name: 'CatalogItems', content: '- Tiramisu ($8.00)' },
      ],
      'Any desserts?'
    )

    expect(prompt.user).toBe('Any desserts?')
    expect(prompt.system).toBe([
      ROLE,
      '=== CONTEXT START ===',
      '(Background information for this conversation. Do not mention it explicitly.)',
      '--- AVAILABLE ITEMS ---\n- Tiramisu ($8.00)',
      '=== CONTEXT END ===',
      '--- GUIDELINES ---\n- Be brief.',
    ].join('\n\n'))
  })

  it('should skip the context block when there is only guidance', () => {
    const prompt = renderPrompt([{ name: 'Instructions', content: '- Be brief.' }], 'Hi')

    expect(prompt.system).toBe(`${ROLE}\n\n--- GUIDELINES ---\n- Be brief.`)
  })
})
