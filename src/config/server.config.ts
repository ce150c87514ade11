import { readEnv } from './env'

const env = readEnv()

export const SERVER_CONFIG = {
  port: env.PORT,
} as const
