/**
 * Redis Key-Value Store
 *
 * Shared backing store; Redis expires keys itself so TTL resets are a plain
 * SETEX. Key prefixing is left to the ioredis `keyPrefix` option.
 */

import type { KeyValueStore } from './kv-store'

/**
 * The slice of the ioredis client this store calls
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>
  setex(key: string, seconds: number, value: string): Promise<unknown>
  del(key: string): Promise<number>
  quit(): Promise<unknown>
}

export class RedisKeyValueStore implements KeyValueStore {
  constructor(private redis: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key)
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.setex(key, Math.max(1, Math.ceil(ttlSeconds)), value)
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key)
  }

  async close(): Promise<void> {
    await this.redis.quit()
  }
}
