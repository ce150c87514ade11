import { describe, it, expect } from 'vitest'
import { assertBucketDurations, bucketKey, bucketKeyPrefix, matchPattern, truncateTimestamp } from './bucketKeys'
import { CounterStoreError } from './CounterStoreError'

describe('bucketKeys', () => {
  describe('truncateTimestamp()', () => {
    it('should floor to the interval boundary', () => {
      expect(truncateTimestamp(12_345, 5_000)).toBe(10_000)
    })

    it('should keep timestamps already on a boundary', () => {
      expect(truncateTimestamp(10_000, 5_000)).toBe(10_000)
    })

    it('should put boundary minus one into the previous bucket', () => {
      expect(truncateTimestamp(9_999, 5_000)).toBe(5_000)
    })

    it('should accept Date values', () => {
      const date = new Date('2025-01-01T00:00:07.250Z')

      expect(truncateTimestamp(date, 5_000)).toBe(Date.parse('2025-01-01T00:00:05.000Z'))
    })
  })

  describe('bucketKey()', () => {
    it('should join prefix, user, endpoint and boundary', () => {
      const key = bucketKey({ userId: '10.0.0.1', endpoint: '/ping' }, 10_000)

      expect(key).toBe('ratelimit:10.0.0.1#%2Fping#10000')
    })

    it('should use a custom prefix', () => {
      const key = bucketKey({ userId: 'u1', endpoint: '/ping' }, 0, 'app')

      expect(key).toBe('app:u1#%2Fping#0')
    })

    it('should escape the delimiter inside identifiers', () => {
      const key = bucketKey({ userId: 'a#b', endpoint: '/x#y' }, 5)

      expect(key).toBe('ratelimit:a%23b#%2Fx%23y#5')
    })
  })

  describe('matchPattern()', () => {
    it('should match any boundary for the user and endpoint', () => {
      expect(matchPattern({ userId: 'u1', endpoint: '/ping' })).toBe('ratelimit:u1#%2Fping#*')
    })

    it('should escape glob characters left by URI encoding', () => {
      expect(matchPattern({ userId: 'a*b', endpoint: '/x' })).toBe('ratelimit:a\\*b#%2Fx#*')
    })

    it('should escape glob characters in the prefix', () => {
      expect(matchPattern({ userId: 'u1', endpoint: '/x' }, 'rl[1]')).toBe('rl\\[1\\]:u1#%2Fx#*')
    })

    it('should share the literal part with bucketKey()', () => {
      const key = { userId: 'u1', endpoint: '/ping' }

      expect(bucketKey(key, 42).startsWith(bucketKeyPrefix(key))).toBe(true)
      expect(matchPattern(key)).toBe(`${bucketKeyPrefix(key)}*`)
    })
  })

  describe('assertBucketDurations()', () => {
    it('should accept positive durations', () => {
      expect(() => assertBucketDurations(5_000, 60_000)).not.toThrow()
    })

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('should reject windowInterval %s', (value) => {
      expect(() => assertBucketDurations(value, 60_000)).toThrow(CounterStoreError)
    })

    it('should name the offending argument', () => {
      expect(() => assertBucketDurations(5_000, 0)).toThrow('ttl must be a positive number of milliseconds, got 0')
    })
  })
})
