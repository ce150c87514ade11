import { DEFAULT_ENDPOINT_CONFIG, MINUTE, SECOND } from '../domain/models/RateLimiterConfig'
import type { RateLimiterConfig } from '../domain/models/RateLimiterConfig'
import { readEnv } from './env'

/**
 * Rate limiting configuration for the application.
 *
 * Redis is used for distributed rate limiting across multiple workers.
 * If Redis is unavailable, the system falls back to in-memory counters
 * (which are per-worker and not shared).
 */

const env = readEnv()

/**
 * Redis connection configuration.
 */
export const REDIS_CONFIG = {
  url: env.REDIS_URL,

  /**
   * Force in-memory counters even if Redis is available.
   * Useful for testing single-worker scenarios.
   */
  forceInMemory: env.FORCE_IN_MEMORY_RATE_LIMIT,

  /** COUNT hint for each SCAN page when summing buckets */
  scanCount: env.RATE_LIMIT_SCAN_COUNT,

  /**
   * Key prefix for Redis bucket keys.
   * Format: {prefix}:{userId}#{endpoint}#{bucketStartMs}
   */
  keyPrefix: env.RATE_LIMIT_KEY_PREFIX,
} as const

export const RATE_LIMITER_OPTIONS = {
  /** Store calls slower than this fail open. 0 disables the deadline. */
  storeTimeoutMs: env.RATE_LIMIT_STORE_TIMEOUT_MS,

  /** JSON file with endpoint limits; replaces DEFAULT_RATE_LIMITER_CONFIG when set */
  configPath: env.RATE_LIMIT_CONFIG_PATH,
} as const

/**
 * Endpoint limits used when no config file is given.
 * Keys are normalized endpoints as produced by sanitizePath.
 */
export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  '/': { ...DEFAULT_ENDPOINT_CONFIG },
  '/ping': {
    maxRequests: 5,
    timeWindow: 1 * MINUTE,
    slidingWindowInterval: 5 * SECOND,
  },
}
