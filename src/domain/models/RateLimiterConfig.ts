export const SECOND = 1000
export const MINUTE = 60 * SECOND
export const HOUR = 60 * MINUTE

/**
 * Limits applied to a single normalized endpoint.
 * All durations are expressed in milliseconds.
 */
export interface EndpointConfig {
  /** Maximum number of admitted requests per time window */
  maxRequests: number

  /**
   * Retention horizon for the limit. Buckets expire this long after creation.
   * Defaults to 24 hours.
   */
  timeWindow: number

  /**
   * Rounding unit used to fold a request timestamp into a bucket.
   * Defaults to 1 minute.
   */
  slidingWindowInterval: number
}

/**
 * Endpoint limits keyed by normalized endpoint (e.g. "/ping").
 * Endpoints without an entry are not limited.
 */
export type RateLimiterConfig = Record<string, EndpointConfig>

/**
 * Subject of a rate limit: one caller on one endpoint.
 */
export interface RateLimiterKey {
  userId: string
  endpoint: string
}

export const DEFAULT_ENDPOINT_CONFIG: Readonly<EndpointConfig> = Object.freeze({
  maxRequests: 100,
  timeWindow: 24 * HOUR,
  slidingWindowInterval: 1 * MINUTE,
})

function isPositive(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0
}

/**
 * Fills missing or unusable fields from DEFAULT_ENDPOINT_CONFIG.
 * Each field falls back on its own, so an interval wider than the window is kept as given.
 */
export function normalizeEndpointConfig(config: Partial<EndpointConfig> = {}): EndpointConfig {
  return {
    maxRequests: isPositive(config.maxRequests)
      ? Math.max(1, Math.floor(config.maxRequests))
      : DEFAULT_ENDPOINT_CONFIG.maxRequests,
    timeWindow: isPositive(config.timeWindow) ? config.timeWindow : DEFAULT_ENDPOINT_CONFIG.timeWindow,
    slidingWindowInterval: isPositive(config.slidingWindowInterval)
      ? config.slidingWindowInterval
      : DEFAULT_ENDPOINT_CONFIG.slidingWindowInterval,
  }
}

export function normalizeRateLimiterConfig(
  config: Record<string, Partial<EndpointConfig>>
): Readonly<RateLimiterConfig> {
  const normalized: RateLimiterConfig = {}
  for (const [endpoint, endpointConfig] of Object.entries(config)) {
    normalized[endpoint] = Object.freeze(normalizeEndpointConfig(endpointConfig))
  }
  return Object.freeze(normalized)
}
