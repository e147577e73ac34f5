export type { EmbeddingProvider } from './embedding-provider'
export { OpenAIEmbeddingProvider } from './openai-embedding-provider'
export { hashEmbedding } from './hash-embedding'
export { QueryEmbedding, ResilientEmbedder, embedQuery } from './resilient-embedder'
export type { EmbeddedText, EmbeddingBatch, EmbedOptions, ResilientEmbedderOptions } from './resilient-embedder'
export { cosineSimilarity, normalize } from './vector'
