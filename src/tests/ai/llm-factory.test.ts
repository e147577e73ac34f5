/**
 * Tests for LLM Factory - Configuration-driven provider initialization
 */

import { describe, it, expect } from 'vitest'
import { createLLMProvider, loadLLMConfigFromEnv, createLLMProviderFromEnv, LLMConfigurationError } from '../../ai/llm-factory'
import type { LLMEnvironmentConfig } from '../../ai/llm-factory'
import { OpenAIProvider } from '../../ai/providers/openai'
import { AzureOpenAIProvider } from '../../ai/providers/azure-openai'
import { AnthropicProvider } from '../../ai/providers/anthropic'
import { ConfigurationError } from '../../errors'

describe('LLM Factory', () => {
  describe('createLLMProvider', () => {
    it('should create OpenAI provider with valid config', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'openai',
        openai: {
          apiKey: 'test-key',
          model: 'gpt-4o-mini',
          temperature: 0.7,
        },
      }

      expect(createLLMProvider(config)).toBeInstanceOf(OpenAIProvider)
    })

    it('should create Azure OpenAI provider with valid config', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'azure-openai',
        azureOpenAI: {
          apiKey: 'test-key',
          endpoint: 'https://test.openai.azure.com',
          model: 'chat-deployment',
        },
      }

      expect(createLLMProvider(config)).toBeInstanceOf(AzureOpenAIProvider)
    })

    it('should create Anthropic provider with valid config', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'anthropic',
        anthropic: {
          apiKey: 'test-key',
          model: 'claude-3-5-haiku-latest',
        },
      }

      expect(createLLMProvider(config)).toBeInstanceOf(AnthropicProvider)
    })

    it('should throw error for OpenAI without config', () => {
      const config: LLMEnvironmentConfig = { provider: 'openai' }

      expect(() => createLLMProvider(config)).toThrow(LLMConfigurationError)
      expect(() => createLLMProvider(config)).toThrow('OpenAI provider selected but its configuration is missing')
    })

    it('should throw error for OpenAI without API key', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'openai',
        openai: { apiKey: '', model: 'gpt-4o-mini' },
      }

      expect(() => createLLMProvider(config)).toThrow('OpenAI API key is required')
    })

    it('should throw error for Anthropic without model', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'anthropic',
        anthropic: { apiKey: 'test-key', model: '' },
      }

      expect(() => createLLMProvider(config)).toThrow('Anthropic model is required')
    })

    it('should throw error for Azure OpenAI without endpoint', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'azure-openai',
        azureOpenAI: { apiKey: 'test-key', endpoint: '', model: 'chat-deployment' },
      }

      expect(() => createLLMProvider(config)).toThrow('Azure OpenAI endpoint is required')
    })

    it('should report configuration errors as ConfigurationError', () => {
      expect(() => createLLMProvider({ provider: 'anthropic' })).toThrow(ConfigurationError)
    })
  })

  describe('loadLLMConfigFromEnv', () => {
    it('should load OpenAI config from environment', () => {
      const config = loadLLMConfigFromEnv({
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-key',
        OPENAI_MODEL: 'gpt-4o',
        OPENAI_TEMPERATURE: '0.8',
        OPENAI_MAX_TOKENS: '2000',
      })

      expect(config.provider).toBe('openai')
      expect(config.openai).toEqual({
        apiKey: 'test-key',
        model: 'gpt-4o',
        baseUrl: undefined,
        temperature: 0.8,
        maxTokens: 2000,
      })
    })

    it('should prefer the Azure deployment name as the model', () => {
      const config = loadLLMConfigFromEnv({
        LLM_PROVIDER: 'azure-openai',
        AZURE_OPENAI_API_KEY: 'test-key',
        AZURE_OPENAI_ENDPOINT: 'https://test.openai.azure.com',
        AZURE_OPENAI_DEPLOYMENT: 'chat-deployment',
        AZURE_OPENAI_MODEL: 'gpt-4o',
      })

      expect(config.provider).toBe('azure-openai')
      expect(config.azureOpenAI?.model).toBe('chat-deployment')
      expect(config.azureOpenAI?.endpoint).toBe('https://test.openai.azure.com')
    })

    it('should default to openai provider and model', () => {
      const config = loadLLMConfigFromEnv({ OPENAI_API_KEY: 'test-key' })

      expect(config.provider).toBe('openai')
      expect(config.openai?.model).toBe('gpt-4o-mini')
    })

    it('should default the Anthropic model', () => {
      const config = loadLLMConfigFromEnv({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-key' })

      expect(config.anthropic?.model).toBe('claude-3-5-haiku-latest')
    })

    it('should ignore non-numeric tuning values', () => {
      const config = loadLLMConfigFromEnv({ OPENAI_API_KEY: 'test-key', OPENAI_TEMPERATURE: 'warm' })

      expect(config.openai?.temperature).toBeUndefined()
    })

    it('should leave providers without API keys unconfigured', () => {
      const config = loadLLMConfigFromEnv({})

      expect(config.openai).toBeUndefined()
      expect(config.azureOpenAI).toBeUndefined()
      expect(config.anthropic).toBeUndefined()
    })

    it('should reject an unknown provider', () => {
      expect(() => loadLLMConfigFromEnv({ LLM_PROVIDER: 'x' })).toThrow('Unknown provider: x')
    })

    it('should fail fast when the selected provider has no key', () => {
      expect(() => createLLMProviderFromEnv({ LLM_PROVIDER: 'anthropic' })).toThrow(
        'Anthropic provider selected but its configuration is missing'
      )
    })
  })
})
