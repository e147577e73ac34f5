/**
 * Environment Configuration with Validation
 *
 * Centralizes environment variable loading and provides fail-fast validation.
 * Use this instead of directly accessing process.env throughout the codebase.
 */

import type { EmbeddingConfig } from './types'
import { validateConfigSafe, type EngineConfig, type RedisConfig } from './schema'
import { ConfigurationError } from '../errors'

type Env = Record<string, string | undefined>

type RedisEnvConfig = { [K in keyof RedisConfig]?: RedisConfig[K] | string }

/**
 * Non-numeric input is passed through as the raw string so validation
 * reports it against its config path
 */
function parseNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : value
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  return value === 'true' || value === '1'
}

/**
 * Load Redis configuration from environment
 * Returns null when no Redis host is configured
 */
export function loadRedisConfig(env: Env = process.env): RedisEnvConfig | null {
  const host = env.REDIS_HOST
  if (!host) return null

  return {
    host,
    port: parseNumber(env.REDIS_PORT) ?? 6379,
    password: env.REDIS_PASSWORD || undefined,
    db: parseNumber(env.REDIS_DB),
    keyPrefix: env.REDIS_KEY_PREFIX || undefined,
    commandTimeoutMs: parseNumber(env.REDIS_COMMAND_TIMEOUT_MS),
  }
}

/**
 * Load embedding provider configuration from environment
 * Returns null when no provider is configured; the engine then runs on
 * local hash embeddings only
 */
export function loadEmbeddingConfig(env: Env = process.env): EmbeddingConfig | null {
  const parsedDimensions = parseNumber(env.EMBEDDING_DIMENSIONS) ?? 1536
  if (typeof parsedDimensions !== 'number' || !Number.isInteger(parsedDimensions) || parsedDimensions <= 0) {
    throw new ConfigurationError(`EMBEDDING_DIMENSIONS must be a positive integer, got "${parsedDimensions}"`)
  }
  const dimensions = parsedDimensions

  if (env.EMBEDDING_PROVIDER === 'azure-openai') {
    const endpoint = env.AZURE_OPENAI_ENDPOINT
    const deploymentName = env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT
    const apiKey = env.AZURE_OPENAI_API_KEY

    if (!endpoint || !deploymentName || !apiKey) {
      const missing = []
      if (!endpoint) missing.push('AZURE_OPENAI_ENDPOINT')
      if (!deploymentName) missing.push('AZURE_OPENAI_EMBEDDING_DEPLOYMENT')
      if (!apiKey) missing.push('AZURE_OPENAI_API_KEY')
      throw new ConfigurationError(
        `Azure OpenAI embedding configuration missing: ${missing.join(', ')}`
      )
    }

    return {
      provider: 'azure-openai',
      azure: {
        endpoint,
        deploymentName,
        apiKey,
        apiVersion: env.AZURE_OPENAI_API_VERSION || '2023-05-15',
      },
      dimensions,
    }
  }

  if (!env.OPENAI_API_KEY) return null

  return {
    provider: 'openai',
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL || 'text-embedding-3-small',
    },
    dimensions,
  }
}

/**
 * Build the engine configuration from CONCIERGE_* variables
 * Throws ConfigurationError listing every invalid value
 */
export function loadConfigFromEnv(env: Env = process.env): EngineConfig {
  const redis = loadRedisConfig(env)

  const raw = {
    retrieval: {
      minSimilarity: parseNumber(env.CONCIERGE_RETRIEVAL_MIN_SIMILARITY),
      topK: parseNumber(env.CONCIERGE_RETRIEVAL_TOP_K),
    },
    cache: {
      enabled: parseBoolean(env.CONCIERGE_CACHE_ENABLED),
      similarityThreshold: parseNumber(env.CONCIERGE_CACHE_THRESHOLD),
      ttlSeconds: parseNumber(env.CONCIERGE_CACHE_TTL),
      maxEntriesPerMerchant: parseNumber(env.CONCIERGE_CACHE_MAX_ENTRIES),
    },
    memory: {
      maxTurns: parseNumber(env.CONCIERGE_MEMORY_MAX_TURNS),
      ttlSeconds: parseNumber(env.CONCIERGE_MEMORY_TTL),
      stalenessSeconds: parseNumber(env.CONCIERGE_MEMORY_STALENESS),
    },
    router: {
      heavyThreshold: parseNumber(env.CONCIERGE_ROUTER_HEAVY_THRESHOLD),
    },
    validator: {
      priceTolerance: parseNumber(env.CONCIERGE_PRICE_TOLERANCE),
    },
    timeouts: {
      generationMs: parseNumber(env.CONCIERGE_GENERATION_TIMEOUT_MS),
      embeddingMs: parseNumber(env.CONCIERGE_EMBEDDING_TIMEOUT_MS),
    },
    embedding: {
      dimensions: parseNumber(env.EMBEDDING_DIMENSIONS),
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
      pretty: parseBoolean(env.LOG_PRETTY),
    },
    redis: redis ?? undefined,
  }

  const result = validateConfigSafe(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `Configuration validation failed:\n  - ${result.errors.join('\n  - ')}`,
      { errors: result.errors }
    )
  }

  return result.data
}
