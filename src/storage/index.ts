export type { KeyValueStore } from './kv-store'
export { InMemoryKeyValueStore } from './in-memory-kv-store'
export { RedisKeyValueStore } from './redis-kv-store'
export type { RedisCommands } from './redis-kv-store'
export { FallbackKeyValueStore } from './fallback-kv-store'
export type { FallbackKeyValueStoreOptions } from './fallback-kv-store'
