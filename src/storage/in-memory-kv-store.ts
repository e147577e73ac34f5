/**
 * In-Memory Key-Value Store
 *
 * Process-local map with lazy expiry. Reads drop the record they find
 * expired; every `sweepEvery` writes a full sweep drops the rest. Used as the
 * fallback behind Redis and as the store in tests. Data is lost on restart.
 */

import type { KeyValueStore } from './kv-store'

interface StoredValue {
  value: string
  expiresAt: number
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private records = new Map<string, StoredValue>()
  private writes = 0

  constructor(private now: () => number = Date.now, private sweepEvery = 100) {}

  async get(key: string): Promise<string | null> {
    const record = this.records.get(key)
    if (!record) return null

    // Check if expired
    if (record.expiresAt <= this.now()) {
      this.records.delete(key)
      return null
    }

    return record.value
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.records.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    })

    this.writes++
    if (this.writes % this.sweepEvery === 0) {
      this.cleanup()
    }
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key)
  }

  async close(): Promise<void> {
    this.records.clear()
  }

  /**
   * Drop expired records, returns how many were removed
   */
  cleanup(): number {
    const now = this.now()
    let cleaned = 0

    for (const [key, record] of this.records.entries()) {
      if (record.expiresAt <= now) {
        this.records.delete(key)
        cleaned++
      }
    }

    return cleaned
  }

  size(): number {
    return this.records.size
  }

  // Helper for testing
  clear(): void {
    this.records.clear()
  }
}
