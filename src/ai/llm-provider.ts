/**
 * LLM client contract
 *
 * Each provider speaks its vendor's HTTP API over fetch and maps the reply
 * onto LLMResponse. Callers never see vendor payloads.
 */

export type LLMProvider = 'openai' | 'anthropic' | 'azure-openai'

export interface LLMConfig {
  provider: LLMProvider
  apiKey: string
  /** Model name; the deployment name on Azure */
  model: string
  endpoint?: string
  apiVersion?: string
  temperature?: number
  maxTokens?: number
  topP?: number
}

/**
 * Per-call overrides of the configured sampling parameters
 */
export interface ChatOptions {
  temperature?: number
  maxTokens?: number
  topP?: number
  signal?: AbortSignal
}

export interface LLMMessage {
  role: 'user' | 'assistant' | 'system'
  content: string
}

export interface TokenUsage {
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export interface LLMResponse {
  content: string
  usage: TokenUsage
  model: string
  finishReason?: string
}

export interface ILLMProvider {
  chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse>
}
