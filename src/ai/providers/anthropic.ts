/**
 * Anthropic Provider (Claude)
 * Thin wrapper around the messages API
 */

import { z } from 'zod'
import type { ChatOptions, ILLMProvider, LLMConfig, LLMMessage, LLMResponse } from '../llm-provider'
import { GenerationError } from '../../errors'

const MessagesResponseSchema = z.object({
  model: z.string(),
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  })),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
})

export class AnthropicProvider implements ILLMProvider {
  private config: LLMConfig
  private baseUrl: string

  constructor(config: LLMConfig) {
    this.config = config
    this.baseUrl = config.endpoint || 'https://api.anthropic.com/v1'
  }

  async chat(messages: LLMMessage[], options: ChatOptions = {}): Promise<LLMResponse> {
    const { signal, ...overrides } = options
    const merged = { ...this.config, ...overrides }

    // Anthropic requires system message separate
    const systemMessage = messages.find(m => m.role === 'system')
    const conversationMessages = messages.filter(m => m.role !== 'system')

    const response = await fetch(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': merged.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: merged.model,
        messages: conversationMessages.map(m => ({
          role: m.role,
          content: m.content,
        })),
        system: systemMessage?.content,
        max_tokens: merged.maxTokens ?? 1024,
        temperature: merged.temperature ?? 0.7,
        top_p: merged.topP,
      }),
      signal,
    })

    if (!response.ok) {
      const error = await response.text()
      throw new GenerationError(`Anthropic API error: ${response.status} - ${error}`)
    }

    const parsed = MessagesResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new GenerationError('Anthropic API returned an unexpected payload')
    }
    const data = parsed.data

    return {
      content: data.content.map(block => block.text ?? '').join(''),
      usage: {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
        totalTokens: data.usage.input_tokens + data.usage.output_tokens,
      },
      model: data.model,
      finishReason: data.stop_reason ?? undefined,
    }
  }
}
