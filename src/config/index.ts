/**
 * Central configuration export point.
 * Import all configuration from here to maintain a single source of truth.
 */

export * from './server.config'
export * from './rateLimit.config'
export * from './loadRateLimiterConfig'
export * from './ConfigurationError'
