/**
 * Azure OpenAI Provider
 * Uses the Azure deployment endpoint instead of OpenAI direct
 */

import type { ChatOptions, ILLMProvider, LLMConfig, LLMMessage, LLMResponse } from '../llm-provider'
import { completionBody, readCompletion } from './chat-completions'

export class AzureOpenAIProvider implements ILLMProvider {
  private config: LLMConfig
  private endpoint: string

  constructor(config: LLMConfig) {
    if (!config.endpoint) {
      throw new Error('Azure OpenAI requires endpoint configuration')
    }
    this.config = config
    this.endpoint = config.endpoint.replace(/\/+$/, '')
  }

  async chat(messages: LLMMessage[], options: ChatOptions = {}): Promise<LLMResponse> {
    const { signal, ...overrides } = options
    const merged = { ...this.config, ...overrides }
    const apiVersion = merged.apiVersion || '2024-02-15-preview'

    // https://{resource}.openai.azure.com/openai/deployments/{deployment}/chat/completions?api-version=...
    const url = `${this.endpoint}/openai/deployments/${merged.model}/chat/completions?api-version=${apiVersion}`

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'api-key': merged.apiKey,
      },
      body: JSON.stringify(completionBody(messages, merged)),
      signal,
    })

    return readCompletion('Azure OpenAI', response, merged.model)
  }
}
