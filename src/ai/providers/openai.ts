/**
 * OpenAI Provider
 * Thin wrapper around the chat completions API
 */

import type { ChatOptions, ILLMProvider, LLMConfig, LLMMessage, LLMResponse } from '../llm-provider'
import { completionBody, readCompletion } from './chat-completions'

export class OpenAIProvider implements ILLMProvider {
  private config: LLMConfig
  private baseUrl: string

  constructor(config: LLMConfig) {
    this.config = config
    this.baseUrl = config.endpoint || 'https://api.openai.com/v1'
  }

  async chat(messages: LLMMessage[], options: ChatOptions = {}): Promise<LLMResponse> {
    const { signal, ...overrides } = options
    const merged = { ...this.config, ...overrides }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${merged.apiKey}`,
      },
      body: JSON.stringify({
        model: merged.model,
        ...completionBody(messages, merged),
      }),
      signal,
    })

    return readCompletion('OpenAI', response, merged.model)
  }
}
