import { z } from 'zod'
import { ConfigurationError } from './ConfigurationError'

const BooleanFlag = z
  .enum(['true', 'false', ''])
  .default('false')
  .transform((value) => value === 'true')

const EnvSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(4000),
  REDIS_URL: z.string().default(''),
  FORCE_IN_MEMORY_RATE_LIMIT: BooleanFlag,
  RATE_LIMIT_SCAN_COUNT: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_KEY_PREFIX: z.string().min(1).default('ratelimit'),
  RATE_LIMIT_STORE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(500),
  RATE_LIMIT_CONFIG_PATH: z.string().default(''),
})

export type Env = z.output<typeof EnvSchema>

/**
 * Validates the environment variables this service reads.
 * Unset variables take their defaults.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source)
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }
  return result.data
}
