/**
 * Embedding provider settings, as read by loadEmbeddingConfig
 */

export interface AzureEmbeddingSettings {
  endpoint: string
  deploymentName: string
  apiKey: string
  /** Defaults to 2023-05-15 */
  apiVersion?: string
}

export interface OpenAIEmbeddingSettings {
  apiKey: string
  model: string
  baseUrl?: string
}

/**
 * `dimensions` must match the engine's configured embedding size
 */
export type EmbeddingConfig =
  | { provider: 'azure-openai'; azure: AzureEmbeddingSettings; dimensions: number }
  | { provider: 'openai'; openai: OpenAIEmbeddingSettings; dimensions: number }
