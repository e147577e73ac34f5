/**
 * Generation layer - provider-agnostic LLM calls behind the Generation Gateway
 */

export type {
  ChatOptions,
  ILLMProvider,
  LLMConfig,
  LLMMessage,
  LLMProvider,
  LLMResponse,
  TokenUsage,
} from './llm-provider'

export { OpenAIProvider } from './providers/openai'
export { AnthropicProvider } from './providers/anthropic'
export { AzureOpenAIProvider } from './providers/azure-openai'

export {
  createLLMProvider,
  createLLMProviderFromEnv,
  loadLLMConfigFromEnv,
  LLMConfigurationError,
} from './llm-factory'
export type { LLMEnvironmentConfig } from './llm-factory'

export { LLMGenerationGateway } from './generation-gateway'
export type { GenerationGateway, GenerationParams, Prompt, LLMGenerationGatewayOptions } from './generation-gateway'
