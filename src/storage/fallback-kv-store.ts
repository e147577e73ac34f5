/**
 * Fallback Key-Value Store
 *
 * Prefers the shared store and transparently drops to a process-local map
 * when it is unreachable. After `failureThreshold` consecutive failures the
 * primary's breaker opens and every call goes straight to the local map until
 * the cooldown passes. Callers never see a storage error.
 */

import type { Logger } from 'pino'
import type { KeyValueStore } from './kv-store'
import { InMemoryKeyValueStore } from './in-memory-kv-store'
import { CircuitBreaker, CircuitOpenError } from '../utils/resilience'
import type { DecisionLog } from '../observability/decision-log'
import { errorMessage } from '../errors'

export interface FallbackKeyValueStoreOptions {
  logger: Logger
  decisions?: DecisionLog
  local?: InMemoryKeyValueStore
  failureThreshold?: number
  cooldownMs?: number
}

export class FallbackKeyValueStore implements KeyValueStore {
  private local: InMemoryKeyValueStore
  private breaker: CircuitBreaker
  private logger: Logger
  private decisions?: DecisionLog

  constructor(private primary: KeyValueStore, options: FallbackKeyValueStoreOptions) {
    this.local = options.local ?? new InMemoryKeyValueStore()
    this.logger = options.logger.child({ component: 'fallback-kv-store' })
    this.decisions = options.decisions
    this.breaker = new CircuitBreaker('kv-primary', {
      failureThreshold: options.failureThreshold ?? 3,
      timeout: options.cooldownMs ?? 30000,
    })
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.breaker.execute(() => this.primary.get(key))
    } catch (error) {
      this.degraded('get', key, error)
      return this.local.get(key)
    }
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.breaker.execute(() => this.primary.setWithTTL(key, value, ttlSeconds))
    } catch (error) {
      this.degraded('set', key, error)
      await this.local.setWithTTL(key, value, ttlSeconds)
    }
  }

  async delete(key: string): Promise<void> {
    // Local copy may exist from an earlier outage
    await this.local.delete(key)
    try {
      await this.breaker.execute(() => this.primary.delete(key))
    } catch (error) {
      this.degraded('delete', key, error)
    }
  }

  async close(): Promise<void> {
    try {
      await this.primary.close()
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Primary store did not close cleanly')
    }
    await this.local.close()
  }

  isDegraded(): boolean {
    return this.breaker.getState() !== 'closed'
  }

  private degraded(operation: string, key: string, error: unknown): void {
    if (error instanceof CircuitOpenError) {
      this.logger.debug({ operation, key }, 'Primary store skipped while breaker is open')
      return
    }
    this.logger.warn({ operation, key, error: errorMessage(error) }, 'Primary store unavailable, using local map')
    this.decisions?.record('storage-degraded', {}, { operation, key, error: errorMessage(error) })
  }
}
