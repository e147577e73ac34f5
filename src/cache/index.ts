export { SemanticCache, cacheKey } from './semantic-cache'
export type { SemanticCacheOptions, CacheCallOptions } from './semantic-cache'
