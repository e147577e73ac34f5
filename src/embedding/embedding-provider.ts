/**
 * Embedding Provider - text to fixed-length vector
 * Implementations fail with EmbeddingError
 */
export interface EmbeddingProvider {
  readonly dimensions: number
  embed(text: string, signal?: AbortSignal): Promise<number[]>
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>
}
