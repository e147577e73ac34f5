/**
 * LLM Factory - Configuration-driven provider initialization
 *
 * Principle: Plain objects, explicit wiring, no magic
 * Validates at startup, fails fast on misconfiguration
 */

import type { ILLMProvider, LLMProvider as LLMProviderType } from './llm-provider'
import { OpenAIProvider } from './providers/openai'
import { AnthropicProvider } from './providers/anthropic'
import { AzureOpenAIProvider } from './providers/azure-openai'
import { ConfigurationError } from '../errors'

interface ProviderSettings {
  apiKey: string
  model: string
  temperature?: number
  maxTokens?: number
}

/**
 * Environment-based configuration
 */
export interface LLMEnvironmentConfig {
  /** Primary provider to use */
  provider: LLMProviderType

  /** OpenAI configuration */
  openai?: ProviderSettings & { baseUrl?: string }

  /** Azure OpenAI configuration; `model` is the deployment name */
  azureOpenAI?: ProviderSettings & { endpoint: string; apiVersion?: string }

  /** Anthropic configuration */
  anthropic?: ProviderSettings
}

/**
 * Validation errors
 */
export class LLMConfigurationError extends ConfigurationError {
  constructor(message: string) {
    super(message)
    this.name = 'LLMConfigurationError'
  }
}

const PROVIDERS: readonly LLMProviderType[] = ['openai', 'azure-openai', 'anthropic']

function isProvider(value: string): value is LLMProviderType {
  return PROVIDERS.some(provider => provider === value)
}

function requireSettings<T extends ProviderSettings>(settings: T | undefined, label: string): T {
  if (!settings) {
    throw new LLMConfigurationError(`${label} provider selected but its configuration is missing`)
  }
  if (!settings.apiKey) {
    throw new LLMConfigurationError(`${label} API key is required`)
  }
  if (!settings.model) {
    throw new LLMConfigurationError(`${label} model is required`)
  }
  return settings
}

/**
 * Create LLM provider from environment configuration
 * Throws LLMConfigurationError if configuration is invalid
 */
export function createLLMProvider(config: LLMEnvironmentConfig): ILLMProvider {
  switch (config.provider) {
    case 'openai': {
      const openai = requireSettings(config.openai, 'OpenAI')
      return new OpenAIProvider({
        provider: 'openai',
        apiKey: openai.apiKey,
        model: openai.model,
        endpoint: openai.baseUrl,
        temperature: openai.temperature,
        maxTokens: openai.maxTokens,
      })
    }

    case 'azure-openai': {
      const azure = requireSettings(config.azureOpenAI, 'Azure OpenAI')
      if (!azure.endpoint) {
        throw new LLMConfigurationError('Azure OpenAI endpoint is required')
      }
      return new AzureOpenAIProvider({
        provider: 'azure-openai',
        apiKey: azure.apiKey,
        endpoint: azure.endpoint,
        apiVersion: azure.apiVersion,
        model: azure.model,
        temperature: azure.temperature,
        maxTokens: azure.maxTokens,
      })
    }

    case 'anthropic': {
      const anthropic = requireSettings(config.anthropic, 'Anthropic')
      return new AnthropicProvider({
        provider: 'anthropic',
        apiKey: anthropic.apiKey,
        model: anthropic.model,
        temperature: anthropic.temperature,
        maxTokens: anthropic.maxTokens,
      })
    }

    default:
      throw new LLMConfigurationError(`Unknown provider: ${String(config.provider)}`)
  }
}

type Env = Record<string, string | undefined>

function optionalNumber(value: string | undefined): number | undefined {
  if (!value) return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/**
 * Load configuration from environment variables
 */
export function loadLLMConfigFromEnv(env: Env = process.env): LLMEnvironmentConfig {
  const requested = env.LLM_PROVIDER || 'openai'
  if (!isProvider(requested)) {
    throw new LLMConfigurationError(`Unknown provider: ${requested}`)
  }

  return {
    provider: requested,
    openai: env.OPENAI_API_KEY ? {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL || 'gpt-4o-mini',
      baseUrl: env.OPENAI_BASE_URL || undefined,
      temperature: optionalNumber(env.OPENAI_TEMPERATURE),
      maxTokens: optionalNumber(env.OPENAI_MAX_TOKENS),
    } : undefined,
    azureOpenAI: env.AZURE_OPENAI_API_KEY ? {
      apiKey: env.AZURE_OPENAI_API_KEY,
      endpoint: env.AZURE_OPENAI_ENDPOINT || '',
      apiVersion: env.AZURE_OPENAI_CHAT_API_VERSION || undefined,
      model: env.AZURE_OPENAI_DEPLOYMENT || env.AZURE_OPENAI_MODEL || '',
      temperature: optionalNumber(env.AZURE_OPENAI_TEMPERATURE),
      maxTokens: optionalNumber(env.AZURE_OPENAI_MAX_TOKENS),
    } : undefined,
    anthropic: env.ANTHROPIC_API_KEY ? {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL || 'claude-3-5-haiku-latest',
      temperature: optionalNumber(env.ANTHROPIC_TEMPERATURE),
      maxTokens: optionalNumber(env.ANTHROPIC_MAX_TOKENS),
    } : undefined,
  }
}

/**
 * Create LLM provider from environment variables
 * Validates at startup, fails fast on misconfiguration
 */
export function createLLMProviderFromEnv(env: Env = process.env): ILLMProvider {
  return createLLMProvider(loadLLMConfigFromEnv(env))
}
