import type { RateLimiterKey } from '../../domain/models/RateLimiterConfig'
import type { CounterStoreCallOptions, ICounterStore } from './ICounterStore'
import { abortable } from './abortable'
import {
  DEFAULT_KEY_PREFIX,
  assertBucketDurations,
  bucketKey,
  bucketKeyPrefix,
  truncateTimestamp,
} from './bucketKeys'

interface BucketEntry {
  count: number
  expiresAt: number
}

/**
 * In-memory counter store. Expired buckets are evicted lazily: every get()
 * prunes expired entries of all keys, not only the key being read.
 * Suitable for single-worker development or as a fallback when Redis is unavailable.
 *
 * WARNING: This implementation does NOT share state between workers.
 * For production with multiple workers, use RedisCounterStore.
 */
export class InMemoryCounterStore implements ICounterStore {
  private buckets: Map<string, BucketEntry>

  constructor(private readonly keyPrefix: string = DEFAULT_KEY_PREFIX) {
    this.buckets = new Map()
  }

  async get(key: RateLimiterKey, options: CounterStoreCallOptions = {}): Promise<number> {
    return abortable('get', async () => this.sum(key), options.signal)
  }

  async set(
    key: RateLimiterKey,
    timestamp: Date | number,
    windowInterval: number,
    ttl: number,
    options: CounterStoreCallOptions = {}
  ): Promise<void> {
    return abortable(
      'set',
      async () => {
        assertBucketDurations(windowInterval, ttl)
        const k = bucketKey(key, truncateTimestamp(timestamp, windowInterval), this.keyPrefix)
        const now = Date.now()

        const entry = this.buckets.get(k)
        if (!entry || entry.expiresAt <= now) {
          this.buckets.set(k, { count: 1, expiresAt: now + ttl })
          return
        }
        entry.count += 1
      },
      options.signal
    )
  }

  async reset(key: RateLimiterKey): Promise<void> {
    const prefix = bucketKeyPrefix(key, this.keyPrefix)
    for (const k of [...this.buckets.keys()]) {
      if (k.startsWith(prefix)) {
        this.buckets.delete(k)
      }
    }
  }

  async disconnect(): Promise<void> {
    this.buckets.clear()
  }

  private sum(key: RateLimiterKey): number {
    const prefix = bucketKeyPrefix(key, this.keyPrefix)
    const now = Date.now()
    let count = 0

    for (const [k, entry] of this.buckets) {
      if (entry.expiresAt <= now) {
        this.buckets.delete(k)
        continue
      }
      if (k.startsWith(prefix)) {
        count += entry.count
      }
    }
    return count
  }
}
