import type { RateLimiterKey } from '../../domain/models/RateLimiterConfig'
import { CounterStoreError } from './CounterStoreError'

export const DEFAULT_KEY_PREFIX = 'ratelimit'

/** Separates user, endpoint and boundary. Escaped out of every component. */
const DELIMITER = '#'

const GLOB_METACHARACTERS = /[*?[\]\\]/g

function encodeComponent(value: string): string {
  return encodeURIComponent(value)
}

function escapeGlob(value: string): string {
  return value.replace(GLOB_METACHARACTERS, '\\$&')
}

function keyStem(key: RateLimiterKey, prefix: string): string {
  return `${prefix}:${encodeComponent(key.userId)}${DELIMITER}${encodeComponent(key.endpoint)}${DELIMITER}`
}

/**
 * Floors a timestamp to the start of its bucket.
 * Example: truncateTimestamp(12_345, 5_000) === 10_000
 */
export function truncateTimestamp(timestamp: Date | number, windowInterval: number): number {
  const ms = typeof timestamp === 'number' ? timestamp : timestamp.getTime()
  return ms - (((ms % windowInterval) + windowInterval) % windowInterval)
}

/**
 * Key of a single bucket.
 * Format: {prefix}:{userId}#{endpoint}#{boundaryMs}
 * Example: ratelimit:10.0.0.1#%2Fping#1735689600000
 */
export function bucketKey(key: RateLimiterKey, boundary: number, prefix: string = DEFAULT_KEY_PREFIX): string {
  return `${keyStem(key, prefix)}${boundary}`
}

/**
 * Redis glob matching every bucket of one user and endpoint, and nothing else.
 */
export function matchPattern(key: RateLimiterKey, prefix: string = DEFAULT_KEY_PREFIX): string {
  return `${escapeGlob(keyStem(key, prefix))}*`
}

/**
 * Literal prefix shared by every bucket of one user and endpoint.
 * Used by stores that can compare strings directly instead of globbing.
 */
export function bucketKeyPrefix(key: RateLimiterKey, prefix: string = DEFAULT_KEY_PREFIX): string {
  return keyStem(key, prefix)
}

/**
 * Rejects bucket widths and lifetimes that cannot produce a bucket.
 */
export function assertBucketDurations(windowInterval: number, ttl: number): void {
  for (const [name, value] of [['windowInterval', windowInterval], ['ttl', ttl]] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new CounterStoreError('set', `${name} must be a positive number of milliseconds, got ${value}`)
    }
  }
}
