/**
 * Generation Gateway
 *
 * The single externally-suspending step of a request. Every call carries
 * a bounded timeout; failures surface as GenerationError and are never
 * retried here (the router's tier fallback is the only retry).
 */

import type { Logger } from 'pino'
import type { ILLMProvider } from './llm-provider'
import type { Metrics } from '../observability'
import { withTimeout, TimeoutError } from '../utils/resilience'
import { GenerationError, RequestCancelledError, errorMessage } from '../errors'

export interface Prompt {
  system: string
  user: string
}

export interface GenerationParams {
  maxTokens: number
  temperature: number
  signal?: AbortSignal
}

export interface GenerationGateway {
  generate(prompt: Prompt, params: GenerationParams): Promise<string>
}

export interface LLMGenerationGatewayOptions {
  timeoutMs: number
  logger: Logger
  metrics?: Metrics
}

export class LLMGenerationGateway implements GenerationGateway {
  private logger: Logger

  constructor(
    private provider: ILLMProvider,
    private options: LLMGenerationGatewayOptions
  ) {
    this.logger = options.logger.child({ component: 'generation-gateway' })
  }

  async generate(prompt: Prompt, params: GenerationParams): Promise<string> {
    const start = Date.now()
    try {
      const response = await withTimeout(
        signal => this.provider.chat(
          [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          { maxTokens: params.maxTokens, temperature: params.temperature, signal }
        ),
        this.options.timeoutMs,
        {
          signal: params.signal,
          timeoutMessage: `Generation timed out after ${this.options.timeoutMs}ms`,
        }
      )

      this.options.metrics?.timing('generation.duration', Date.now() - start)
      this.logger.debug({ model: response.model, usage: response.usage, finishReason: response.finishReason }, 'Generation completed')
      return response.content
    } catch (error) {
      this.options.metrics?.timing('generation.duration', Date.now() - start, { status: 'error' })
      if (error instanceof RequestCancelledError || error instanceof GenerationError) throw error
      if (error instanceof TimeoutError) throw new GenerationError(error.message, error)
      throw new GenerationError(`Generation failed: ${errorMessage(error)}`, error)
    }
  }
}
