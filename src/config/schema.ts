/**
 * Zod schemas for engine configuration
 * Every threshold has a default so an empty object is a valid config
 */

import { z } from 'zod'

/**
 * Redis connection configuration
 */
export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().positive().default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).default(0),
  keyPrefix: z.string().default('concierge:'),
  connectTimeoutMs: z.number().int().positive().default(2000),
  commandTimeoutMs: z.number().int().positive().default(1000),
})

export type RedisConfig = z.infer<typeof RedisConfigSchema>

/**
 * Catalog retrieval
 */
export const RetrievalConfigSchema = z.object({
  minSimilarity: z.number().min(0).max(1).default(0.3),
  topK: z.number().int().positive().max(10).default(10),
  lightTopK: z.number().int().positive().max(10).default(5),
  embeddingBatchSize: z.number().int().positive().default(32),
})

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>

/**
 * Similarity-keyed response cache
 */
export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  similarityThreshold: z.number().min(0).max(1).default(0.9),
  ttlSeconds: z.number().int().positive().default(172800), // 48 hours
  maxEntriesPerMerchant: z.number().int().positive().default(200),
})

export type CacheConfig = z.infer<typeof CacheConfigSchema>

/**
 * Per-conversation memory
 */
export const MemoryConfigSchema = z.object({
  maxTurns: z.number().int().positive().default(10),
  ttlSeconds: z.number().int().positive().default(14400), // 4 hours
  stalenessSeconds: z.number().int().positive().default(300), // 5 minutes
  historyTurns: z.number().int().positive().max(3).default(3),
  recentItemTurns: z.number().int().positive().default(3),
})

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>

export const RouterConfigSchema = z.object({
  heavyThreshold: z.number().positive().default(3),
})

export type RouterConfig = z.infer<typeof RouterConfigSchema>

export const ValidatorConfigSchema = z.object({
  priceTolerance: z.number().min(0).max(1).default(0.1),
})

export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>

export const TimeoutConfigSchema = z.object({
  generationMs: z.number().int().positive().default(20000),
  embeddingMs: z.number().int().positive().default(5000),
})

export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>

export const EmbeddingDefaultsSchema = z.object({
  dimensions: z.number().int().positive().default(1536),
  breakerFailureThreshold: z.number().int().positive().default(3),
  breakerCooldownMs: z.number().int().positive().default(30000),
})

export type EmbeddingDefaults = z.infer<typeof EmbeddingDefaultsSchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Complete engine configuration
 */
export const EngineConfigSchema = z.object({
  retrieval: RetrievalConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  router: RouterConfigSchema.default({}),
  validator: ValidatorConfigSchema.default({}),
  timeouts: TimeoutConfigSchema.default({}),
  embedding: EmbeddingDefaultsSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  redis: RedisConfigSchema.optional(),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): EngineConfig {
  return EngineConfigSchema.parse(config)
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: EngineConfig } | { success: false; errors: string[] } {
  const result = EngineConfigSchema.safeParse(config)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
