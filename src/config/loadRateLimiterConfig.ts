import { readFileSync } from 'fs'
import { z } from 'zod'
import { HOUR, MINUTE, SECOND, normalizeEndpointConfig } from '../domain/models/RateLimiterConfig'
import type { EndpointConfig, RateLimiterConfig } from '../domain/models/RateLimiterConfig'
import { ConfigurationError } from './ConfigurationError'

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: SECOND,
  m: MINUTE,
  h: HOUR,
}

/**
 * Milliseconds as a number, or a string with a unit: "500ms", "5s", "1m", "24h".
 */
const DurationSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .transform((value, ctx) => {
        const match = DURATION_PATTERN.exec(value)
        if (!match) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Expected a duration such as "500ms", "5s", "1m" or "24h", got "${value}"`,
          })
          return z.NEVER
        }
        return Number(match[1]) * UNIT_MS[match[2]]
      }),
  ])
  .pipe(z.number().finite().positive('Duration must be positive'))

const SNAKE_CASE_KEYS: Record<string, string> = {
  max_requests: 'maxRequests',
  time_window: 'timeWindow',
  sliding_window_interval: 'slidingWindowInterval',
}

function camelizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value
  }
  return Object.fromEntries(Object.entries(value).map(([key, v]) => [SNAKE_CASE_KEYS[key] ?? key, v]))
}

const EndpointConfigSchema = z.preprocess(
  camelizeKeys,
  z
    .object({
      maxRequests: z.number().int().positive(),
      timeWindow: DurationSchema.optional(),
      slidingWindowInterval: DurationSchema.optional(),
    })
    .strict()
)

const EndpointNameSchema = z
  .string()
  .min(1, 'Endpoint must not be empty')
  .refine((endpoint) => endpoint !== '__proto__', { message: 'Endpoint name "__proto__" is reserved' })

const RateLimiterConfigSchema = z.record(EndpointNameSchema, EndpointConfigSchema)

export type RateLimiterConfigInput = z.input<typeof RateLimiterConfigSchema>

export interface LoadConfigOptions {
  logger?: Pick<Console, 'warn'>
}

/**
 * Validates endpoint limits and fills unset durations with defaults.
 * Both camelCase and snake_case field names are accepted.
 */
export function parseRateLimiterConfig(raw: unknown, options: LoadConfigOptions = {}): RateLimiterConfig {
  const logger = options.logger ?? console
  const result = RateLimiterConfigSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigurationError(
      'Invalid rate limiter configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }

  return Object.fromEntries(
    Object.entries(result.data).map(([endpoint, endpointConfig]): [string, EndpointConfig] => {
      const normalized = normalizeEndpointConfig(endpointConfig)
      if (normalized.slidingWindowInterval > normalized.timeWindow) {
        logger.warn(
          `Endpoint ${endpoint}: slidingWindowInterval (${normalized.slidingWindowInterval}ms) exceeds timeWindow (${normalized.timeWindow}ms); each bucket will cover the whole window`
        )
      }
      return [endpoint, normalized]
    })
  )
}

/**
 * Reads endpoint limits from a JSON file at startup. Not reloaded afterwards.
 */
export function loadRateLimiterConfig(path: string, options: LoadConfigOptions = {}): RateLimiterConfig {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read rate limiter configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`
    )
  }
  return parseRateLimiterConfig(raw, options)
}
