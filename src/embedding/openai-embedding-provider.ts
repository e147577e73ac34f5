/**
 * OpenAI / Azure OpenAI embeddings over fetch
 */

import { z } from 'zod'
import type { EmbeddingConfig } from '../config/types'
import type { EmbeddingProvider } from './embedding-provider'
import { EmbeddingError, errorMessage } from '../errors'

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number().int(),
  })),
})

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number

  constructor(private config: EmbeddingConfig) {
    this.dimensions = config.dimensions
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal)
    return embedding
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return []

    const { url, headers, body } = this.buildRequest(texts)

    let response: Response
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal,
      })
    } catch (error) {
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(error)}`, error)
    }

    if (!response.ok) {
      const error = await response.text()
      throw new EmbeddingError(`${this.config.provider} embedding API error: ${response.status} - ${error}`)
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new EmbeddingError('Embedding API returned an unexpected payload')
    }

    const embeddings = [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map(d => d.embedding)

    if (embeddings.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embeddings, received ${embeddings.length}`)
    }
    if (embeddings.some(e => e.length !== this.dimensions)) {
      throw new EmbeddingError(`Embedding dimensionality differs from configured ${this.dimensions}`)
    }

    return embeddings
  }

  private buildRequest(texts: string[]): { url: string; headers: Record<string, string>; body: Record<string, unknown> } {
    if (this.config.provider === 'azure-openai') {
      const { azure } = this.config
      const apiVersion = azure.apiVersion || '2023-05-15'
      return {
        url: `${azure.endpoint}/openai/deployments/${azure.deploymentName}/embeddings?api-version=${apiVersion}`,
        headers: {
          'Content-Type': 'application/json',
          'api-key': azure.apiKey,
        },
        body: { input: texts },
      }
    }

    const { openai } = this.config
    return {
      url: `${openai.baseUrl || 'https://api.openai.com/v1'}/embeddings`,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${openai.apiKey}`,
      },
      body: {
        input: texts,
        model: openai.model,
        dimensions: this.config.dimensions,
      },
    }
  }
}
