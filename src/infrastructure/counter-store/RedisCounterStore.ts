import Redis from 'ioredis'
import type { RateLimiterKey } from '../../domain/models/RateLimiterConfig'
import type { CounterStoreCallOptions, ICounterStore } from './ICounterStore'
import { CounterStoreError } from './CounterStoreError'
import type { CounterStoreOperation } from './CounterStoreError'
import { abortable } from './abortable'
import {
  DEFAULT_KEY_PREFIX,
  assertBucketDurations,
  bucketKey,
  matchPattern,
  truncateTimestamp,
} from './bucketKeys'

/**
 * Redis commands the counter store relies on. An ioredis client satisfies it.
 */
export interface RedisCounterClient {
  incr(key: string): Promise<number>
  pexpire(key: string, milliseconds: number): Promise<number>
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[cursor: string, elements: string[]]>
  mget(keys: string[]): Promise<Array<string | null>>
  del(...keys: string[]): Promise<number>
  quit(): Promise<string>
}

export interface RedisCounterStoreOptions {
  /** COUNT hint for each SCAN page. Default: 100 */
  scanCount?: number
  /** Namespace for bucket keys. Default: "ratelimit" */
  keyPrefix?: string
}

export const DEFAULT_SCAN_COUNT = 100

/**
 * Creates an ioredis client that connects on demand and retries with backoff.
 */
export function createRedisClient(redisUrl: string): Redis {
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => {
      // Retry with exponential backoff, max 3 seconds
      return Math.min(times * 100, 3000)
    },
    lazyConnect: true,
  })

  // Handle connection errors gracefully
  client.on('error', (err: Error) => {
    console.error('Redis connection error:', err.message)
  })

  client.on('connect', () => {
    console.log('Redis connected successfully')
  })

  return client
}

function parseCount(key: string, value: string | null): number {
  // Bucket expired between SCAN and MGET
  if (value === null) {
    return 0
  }
  const count = Number(value)
  if (!Number.isSafeInteger(count)) {
    throw new Error(`Bucket ${key} holds a non-integer value "${value}"`)
  }
  return count
}

/**
 * Redis-backed sliding window counters.
 * Each bucket is a plain integer key; INCR keeps concurrent updates from being lost.
 * Suitable for distributed systems with multiple workers.
 */
export class RedisCounterStore implements ICounterStore {
  private readonly scanCount: number
  private readonly keyPrefix: string

  constructor(private readonly client: RedisCounterClient, options: RedisCounterStoreOptions = {}) {
    this.scanCount = options.scanCount ?? DEFAULT_SCAN_COUNT
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX
  }

  /**
   * Sums every bucket matching the user and endpoint.
   * SCAN may return a key more than once while the keyspace changes, so keys are counted once.
   */
  async get(key: RateLimiterKey, options: CounterStoreCallOptions = {}): Promise<number> {
    const { signal } = options

    return abortable(
      'get',
      () =>
        this.wrap('get', key, async () => {
          const seen = new Set<string>()
          let count = 0

          await this.scanBuckets(key, signal, async (keys) => {
            const fresh = keys.filter((k) => {
              if (seen.has(k)) {
                return false
              }
              seen.add(k)
              return true
            })
            if (fresh.length === 0) {
              return
            }

            const values = await this.client.mget(fresh)
            values.forEach((value, i) => {
              count += parseCount(fresh[i], value)
            })
          })

          return count
        }),
      signal
    )
  }

  /**
   * Increments the bucket for the floored timestamp and sets its TTL when the bucket is new.
   * INCR and PEXPIRE are separate commands: a failure between them leaves a bucket without expiry.
   */
  async set(
    key: RateLimiterKey,
    timestamp: Date | number,
    windowInterval: number,
    ttl: number,
    options: CounterStoreCallOptions = {}
  ): Promise<void> {
    assertBucketDurations(windowInterval, ttl)
    const k = bucketKey(key, truncateTimestamp(timestamp, windowInterval), this.keyPrefix)

    return abortable(
      'set',
      () =>
        this.wrap('set', key, async () => {
          const count = await this.client.incr(k)
          if (count === 1) {
            await this.client.pexpire(k, Math.ceil(ttl))
          }
        }),
      options.signal
    )
  }

  /**
   * Collects every bucket first, then deletes in batches of scanCount.
   */
  async reset(key: RateLimiterKey): Promise<void> {
    return this.wrap('reset', key, async () => {
      const found = new Set<string>()
      await this.scanBuckets(key, undefined, async (keys) => {
        keys.forEach((k) => found.add(k))
      })

      const keys = [...found]
      for (let i = 0; i < keys.length; i += this.scanCount) {
        await this.client.del(...keys.slice(i, i + this.scanCount))
      }
    })
  }

  async disconnect(): Promise<void> {
    try {
      await this.client.quit()
    } catch (error) {
      console.error('Redis disconnect error:', error)
    }
  }

  private async scanBuckets(
    key: RateLimiterKey,
    signal: AbortSignal | undefined,
    onPage: (keys: string[]) => Promise<void>
  ): Promise<void> {
    const pattern = matchPattern(key, this.keyPrefix)
    let cursor = '0'

    do {
      signal?.throwIfAborted()
      const [next, keys] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', this.scanCount)
      await onPage(keys)
      cursor = next
    } while (cursor !== '0')
  }

  private async wrap<T>(operation: CounterStoreOperation, key: RateLimiterKey, run: () => Promise<T>): Promise<T> {
    try {
      return await run()
    } catch (error) {
      if (error instanceof CounterStoreError) {
        throw error
      }
      throw new CounterStoreError(
        operation,
        `Redis ${operation} failed for user ${key.userId} on ${key.endpoint}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      )
    }
  }
}
