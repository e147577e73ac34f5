/**
 * Chat engine wiring
 *
 * Collaborators are decided once, here: an embedding provider or local
 * vectors only, Redis or the in-process map. Nothing downstream probes for
 * optional collaborators per request.
 */

import { Redis } from 'ioredis'
import type { Logger } from 'pino'
import type { EmbeddingProvider } from '../embedding/embedding-provider'
import type { GenerationGateway } from '../ai/generation-gateway'
import type { KeyValueStore } from '../storage/kv-store'
import type { Metrics } from '../observability'
import { validateConfig, type EngineConfig, type EngineConfigInput, type RedisConfig } from '../config/schema'
import { loadConfigFromEnv, loadEmbeddingConfig } from '../config/environment'
import { createLogger, logger as rootLogger, metrics as rootMetrics, DecisionLog } from '../observability'
import { InMemoryKeyValueStore } from '../storage/in-memory-kv-store'
import { RedisKeyValueStore } from '../storage/redis-kv-store'
import { FallbackKeyValueStore } from '../storage/fallback-kv-store'
import { ResilientEmbedder } from '../embedding/resilient-embedder'
import { OpenAIEmbeddingProvider } from '../embedding/openai-embedding-provider'
import { CatalogIndex } from '../catalog/catalog-index'
import { ConversationMemory } from '../memory/conversation-memory'
import { SemanticCache } from '../cache/semantic-cache'
import { Router } from '../routing/router'
import { ContextAssembler } from '../context/context-assembler'
import { ResponseValidator } from '../validation/response-validator'
import { LLMGenerationGateway } from '../ai/generation-gateway'
import { createLLMProviderFromEnv } from '../ai/llm-factory'
import { ChatEngine } from './chat-engine'

export interface ChatEngineOptions {
  generator: GenerationGateway
  config?: EngineConfigInput
  /** Remote embedding provider; omitted or null runs on local vectors */
  embeddingProvider?: EmbeddingProvider | null
  /** Shared store for memory and cache; defaults to an in-process map */
  store?: KeyValueStore
  logger?: Logger
  metrics?: Metrics
  decisions?: DecisionLog
  now?: () => number
}

export function createChatEngine(options: ChatEngineOptions): ChatEngine {
  const config = validateConfig(options.config ?? {})
  const logger = options.logger ?? rootLogger
  const metrics = options.metrics ?? rootMetrics
  const decisions = options.decisions ?? new DecisionLog(logger.child({ component: 'decision-log' }))
  const store = options.store ?? new InMemoryKeyValueStore(options.now)

  const embedder = new ResilientEmbedder(options.embeddingProvider ?? null, {
    dimensions: config.embedding.dimensions,
    timeoutMs: config.timeouts.embeddingMs,
    breakerFailureThreshold: config.embedding.breakerFailureThreshold,
    breakerCooldownMs: config.embedding.breakerCooldownMs,
    decisions,
    metrics,
    now: options.now,
  })

  const catalog = new CatalogIndex(embedder, { retrieval: config.retrieval, logger })
  const memory = new ConversationMemory(store, { memory: config.memory, logger, now: options.now })
  const cache = new SemanticCache(store, embedder, { cache: config.cache, logger, decisions, metrics, now: options.now })

  return new ChatEngine({
    store,
    embedder,
    catalog,
    memory,
    cache,
    router: new Router({ router: config.router, logger, decisions, metrics }),
    assembler: new ContextAssembler(catalog, memory, { retrieval: config.retrieval, memory: config.memory, logger }),
    validator: new ResponseValidator(catalog, { validator: config.validator, logger, decisions, metrics }),
    generator: options.generator,
    decisions,
    metrics,
    logger,
    config,
  })
}

/**
 * Redis behind the local-map fallback. Commands issued before the first
 * connection completes wait in the offline queue; once connected, a command
 * that outlives commandTimeoutMs counts against the fallback breaker.
 */
export function createRedisStore(config: RedisConfig, logger: Logger, decisions?: DecisionLog): FallbackKeyValueStore {
  const redis = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    keyPrefix: config.keyPrefix,
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1,
  })
  redis.on('error', (error: Error) => {
    logger.warn({ component: 'redis', error: error.message }, 'Redis connection error')
  })
  return new FallbackKeyValueStore(new RedisKeyValueStore(redis), { logger, decisions })
}

type Env = Record<string, string | undefined>

/**
 * Engine from environment variables
 * Throws ConfigurationError on invalid settings
 */
export function createChatEngineFromEnv(env: Env = process.env): ChatEngine {
  const config: EngineConfig = loadConfigFromEnv(env)
  const logger = createLogger(config.logging)
  const decisions = new DecisionLog(logger.child({ component: 'decision-log' }))

  const generator = new LLMGenerationGateway(createLLMProviderFromEnv(env), {
    timeoutMs: config.timeouts.generationMs,
    logger,
    metrics: rootMetrics,
  })

  const embeddingConfig = loadEmbeddingConfig(env)
  const embeddingProvider = embeddingConfig ? new OpenAIEmbeddingProvider(embeddingConfig) : null

  const store = config.redis ? createRedisStore(config.redis, logger, decisions) : undefined
  if (!config.redis) {
    logger.info('No REDIS_HOST configured, memory and cache are process-local')
  }

  return createChatEngine({ generator, config, embeddingProvider, store, logger, decisions })
}
