import { describe, it, expect, afterEach, vi } from 'vitest'
import { ResilientEmbedder } from '../../embedding/resilient-embedder'
import { hashEmbedding } from '../../embedding/hash-embedding'
import { cosineSimilarity } from '../../embedding/vector'
import { OpenAIEmbeddingProvider } from '../../embedding/openai-embedding-provider'
import type { EmbeddingProvider } from '../../embedding/embedding-provider'
import { DecisionLog, InMemoryMetrics } from '../../observability'
import { EmbeddingError, RequestCancelledError } from '../../errors'
import { FailingEmbeddingProvider, KeywordEmbeddingProvider, createClock, silentLogger } from '../utils/fixtures'

class HangingEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions = 8

  async embed(): Promise<number[]> {
    return new Promise(() => {})
  }

  embedBatch(_texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return new Promise((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')))
    })
  }
}

describe('hashEmbedding', () => {
  it('should be deterministic and unit length', () => {
    const a = hashEmbedding('vegan buddha bowl', 64)
    const b = hashEmbedding('vegan buddha bowl', 64)

    expect(a).toEqual(b)
    expect(a).toHaveLength(64)
    expect(Math.sqrt(a.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 10)
  })

  it('should score shared words above unrelated text', () => {
    const query = hashEmbedding('vegan bowl', 256)
    const related = hashEmbedding('vegan buddha bowl with quinoa', 256)
    const unrelated = hashEmbedding('grilled salmon fillet', 256)

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated))
  })

  it('should return the zero vector for text without content words', () => {
    expect(hashEmbedding('the', 4)).toEqual([0, 0, 0, 0])
  })
})

describe('ResilientEmbedder', () => {
  it('should run on local vectors without a provider', async () => {
    const embedder = new ResilientEmbedder(null, { dimensions: 32, timeoutMs: 100 })

    const batch = await embedder.embedBatch(['pizza', 'salad'])

    expect(batch.source).toBe('local')
    expect(batch.vectors).toEqual([hashEmbedding('pizza', 32), hashEmbedding('salad', 32)])
    expect(embedder.hasProvider).toBe(false)
  })

  it('should use provider vectors when the provider answers', async () => {
    const embedder = new ResilientEmbedder(new KeywordEmbeddingProvider(), { dimensions: 8, timeoutMs: 100 })

    const { vector, source } = await embedder.embed('pizza')

    expect(source).toBe('provider')
    expect(vector).toEqual([0, 1, 0, 0, 0, 0, 0, 0])
  })

  it('should refuse a provider of another dimensionality', () => {
    expect(() => new ResilientEmbedder(new KeywordEmbeddingProvider(), { dimensions: 16, timeoutMs: 100 }))
      .toThrow(EmbeddingError)
  })

  it('should degrade to local vectors and record the decision', async () => {
    const decisions = new DecisionLog(silentLogger)
    const metrics = new InMemoryMetrics()
    const embedder = new ResilientEmbedder(new FailingEmbeddingProvider(16), {
      dimensions: 16,
      timeoutMs: 100,
      decisions,
      metrics,
    })

    const batch = await embedder.embedBatch(['pizza'], { context: { merchantId: 'bistro' } })

    expect(batch.source).toBe('local')
    expect(batch.vectors[0]).toEqual(hashEmbedding('pizza', 16))
    expect(decisions.list({ kind: 'embedding-degraded' })).toHaveLength(1)
    expect(decisions.list()[0].detail.error).toBe('provider unavailable')
    expect(metrics.getCounter('embedding.degraded')).toBe(1)
  })

  it('should stop calling a failing provider once the breaker opens', async () => {
    const clock = createClock()
    const provider = new FailingEmbeddingProvider(16)
    const embedder = new ResilientEmbedder(provider, {
      dimensions: 16,
      timeoutMs: 100,
      breakerFailureThreshold: 3,
      breakerCooldownMs: 30_000,
      now: clock.now,
    })

    for (let i = 0; i < 4; i++) {
      await embedder.embedBatch(['pizza'])
    }
    expect(provider.calls).toBe(3)

    clock.advance(30_000)
    await embedder.embedBatch(['pizza'])
    expect(provider.calls).toBe(4)
  })

  it('should degrade when the provider times out', async () => {
    const embedder = new ResilientEmbedder(new HangingEmbeddingProvider(), { dimensions: 8, timeoutMs: 20 })

    const batch = await embedder.embedBatch(['pizza'])

    expect(batch.source).toBe('local')
  })

  it('should rethrow caller cancellation', async () => {
    const controller = new AbortController()
    controller.abort()
    const embedder = new ResilientEmbedder(new KeywordEmbeddingProvider(), { dimensions: 8, timeoutMs: 100 })

    await expect(embedder.embedBatch(['pizza'], { signal: controller.signal }))
      .rejects.toBeInstanceOf(RequestCancelledError)
  })
})

describe('OpenAIEmbeddingProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should order embeddings by index', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response(JSON.stringify({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    }), { status: 200 }))
    vi.stubGlobal('fetch', fetchMock)

    const provider = new OpenAIEmbeddingProvider({
      provider: 'openai',
      openai: { apiKey: 'test-key', model: 'text-embedding-3-small' },
      dimensions: 2,
    })
    const vectors = await provider.embedBatch(['pizza', 'salad'])

    expect(vectors).toEqual([[1, 0], [0, 1]])
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://api.openai.com/v1/embeddings')
    expect(JSON.parse(String(init.body))).toEqual({
      input: ['pizza', 'salad'],
      model: 'text-embedding-3-small',
      dimensions: 2,
    })
  })

  it('should address the Azure embedding deployment', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      new Response(JSON.stringify({ data: [{ index: 0, embedding: [1, 0] }] }), { status: 200 }))
    vi.stubGlobal('fetch', fetchMock)

    const provider = new OpenAIEmbeddingProvider({
      provider: 'azure-openai',
      azure: { endpoint: 'https://test.openai.azure.com', deploymentName: 'embed', apiKey: 'test-key' },
      dimensions: 2,
    })
    await provider.embed('pizza')

    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://test.openai.azure.com/openai/deployments/embed/embeddings?api-version=2023-05-15'
    )
  })

  it('should reject vectors of the wrong dimensionality', async () => {
    vi.stubGlobal('fetch', vi.fn(async () =>
      new Response(JSON.stringify({ data: [{ index: 0, embedding: [1, 0, 0] }] }), { status: 200 })))

    const provider = new OpenAIEmbeddingProvider({
      provider: 'openai',
      openai: { apiKey: 'test-key', model: 'text-embedding-3-small' },
      dimensions: 2,
    })

    await expect(provider.embed('pizza')).rejects.toThrow('Embedding dimensionality differs from configured 2')
  })

  it('should raise EmbeddingError on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('rate limited', { status: 429 })))

    const provider = new OpenAIEmbeddingProvider({
      provider: 'openai',
      openai: { apiKey: 'test-key', model: 'text-embedding-3-small' },
      dimensions: 2,
    })

    await expect(provider.embed('pizza')).rejects.toThrow('openai embedding API error: 429 - rate limited')
  })
})
