/**
 * KeyValueStore - backing store for conversation memory and the semantic cache
 *
 * Values are opaque strings; callers own serialization. Concurrent writers to
 * the same key resolve as last-write-wins.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>

  /**
   * Write a value that expires after ttlSeconds; rewriting resets the TTL
   */
  setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void>

  delete(key: string): Promise<void>

  /**
   * Release connections; the store is unusable afterwards
   */
  close(): Promise<void>
}
