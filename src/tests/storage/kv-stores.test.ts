import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryKeyValueStore } from '../../storage/in-memory-kv-store'
import { RedisKeyValueStore } from '../../storage/redis-kv-store'
import { FallbackKeyValueStore } from '../../storage/fallback-kv-store'
import { DecisionLog } from '../../observability'
import { FakeRedis, createClock, silentLogger } from '../utils/fixtures'

describe('InMemoryKeyValueStore', () => {
  it('should expire values after their TTL', async () => {
    const clock = createClock()
    const store = new InMemoryKeyValueStore(clock.now)
    await store.setWithTTL('k', 'v', 10)

    clock.advance(9_999)
    expect(await store.get('k')).toBe('v')

    clock.advance(1)
    expect(await store.get('k')).toBeNull()
  })

  it('should reset the TTL on rewrite', async () => {
    const clock = createClock()
    const store = new InMemoryKeyValueStore(clock.now)
    await store.setWithTTL('k', 'v1', 10)
    clock.advance(8_000)
    await store.setWithTTL('k', 'v2', 10)
    clock.advance(8_000)

    expect(await store.get('k')).toBe('v2')
  })

  it('should drop expired records on cleanup', async () => {
    const clock = createClock()
    const store = new InMemoryKeyValueStore(clock.now)
    await store.setWithTTL('a', '1', 1)
    await store.setWithTTL('b', '2', 60)
    clock.advance(2_000)

    expect(store.cleanup()).toBe(1)
  })

  it('should sweep expired records as it writes', async () => {
    const clock = createClock()
    const store = new InMemoryKeyValueStore(clock.now)

    for (let i = 0; i < 200; i++) {
      await store.setWithTTL(`conv:bistro:c${i}`, '[]', 14400)
      clock.advance(14400 * 1000 + 1)
    }

    expect(store.size()).toBe(1)
  })

  it('should sweep at the configured interval', async () => {
    const clock = createClock()
    const store = new InMemoryKeyValueStore(clock.now, 3)
    await store.setWithTTL('a', '1', 1)
    await store.setWithTTL('b', '2', 1)
    clock.advance(2_000)

    await store.setWithTTL('c', '3', 1)

    expect(store.size()).toBe(1)
  })
})

describe('RedisKeyValueStore', () => {
  it('should write with SETEX rounding the TTL up', async () => {
    const redis = new FakeRedis()
    const store = new RedisKeyValueStore(redis)

    await store.setWithTTL('conv:bistro:c1', '[]', 1.5)

    expect(redis.data.get('conv:bistro:c1')).toEqual({ value: '[]', ttl: 2 })
    expect(await store.get('conv:bistro:c1')).toBe('[]')
    await store.delete('conv:bistro:c1')
    expect(await store.get('conv:bistro:c1')).toBeNull()
  })
})

describe('FallbackKeyValueStore', () => {
  let redis: FakeRedis
  let decisions: DecisionLog

  beforeEach(() => {
    redis = new FakeRedis()
    decisions = new DecisionLog(silentLogger)
  })

  it('should use the primary while it is healthy', async () => {
    const store = new FallbackKeyValueStore(new RedisKeyValueStore(redis), { logger: silentLogger, decisions })

    await store.setWithTTL('k', 'v', 60)

    expect(redis.data.get('k')?.value).toBe('v')
    expect(store.isDegraded()).toBe(false)
  })

  it('should switch to the local map when the primary is down', async () => {
    redis.down = true
    const store = new FallbackKeyValueStore(new RedisKeyValueStore(redis), {
      logger: silentLogger,
      decisions,
      failureThreshold: 1,
    })

    await store.setWithTTL('k', 'v', 60)

    expect(await store.get('k')).toBe('v')
    expect(store.isDegraded()).toBe(true)
    expect(decisions.list({ kind: 'storage-degraded' })).toHaveLength(1)
  })

  it('should return to the primary after the cooldown', async () => {
    redis.down = true
    const store = new FallbackKeyValueStore(new RedisKeyValueStore(redis), {
      logger: silentLogger,
      decisions,
      failureThreshold: 1,
      cooldownMs: 0,
    })
    await store.setWithTTL('k', 'local', 60)

    redis.down = false
    await store.setWithTTL('k', 'shared', 60)

    expect(redis.data.get('k')?.value).toBe('shared')
    expect(store.isDegraded()).toBe(false)
  })

  it('should keep writing through after a single failure', async () => {
    const store = new FallbackKeyValueStore(new RedisKeyValueStore(redis), { logger: silentLogger, decisions })
    redis.down = true
    await store.setWithTTL('conv:bistro:c1', '[]', 60)

    redis.down = false
    await store.setWithTTL('conv:bistro:c2', '[]', 60)

    expect(store.isDegraded()).toBe(false)
    expect([...redis.data.keys()]).toEqual(['conv:bistro:c2'])
  })

  it('should open after three consecutive failures by default', async () => {
    redis.down = true
    const store = new FallbackKeyValueStore(new RedisKeyValueStore(redis), { logger: silentLogger, decisions })

    await store.setWithTTL('k', 'v', 60)
    await store.setWithTTL('k', 'v', 60)
    expect(store.isDegraded()).toBe(false)

    await store.setWithTTL('k', 'v', 60)
    expect(store.isDegraded()).toBe(true)
    expect(await store.get('k')).toBe('v')
  })

  it('should close the primary connection', async () => {
    const store = new FallbackKeyValueStore(new RedisKeyValueStore(redis), { logger: silentLogger, decisions })

    await store.close()

    expect(redis.closed).toBe(true)
  })
})
