import 'dotenv/config'
import http from 'http'
import {
  DEFAULT_RATE_LIMITER_CONFIG,
  RATE_LIMITER_OPTIONS,
  REDIS_CONFIG,
  SERVER_CONFIG,
  loadRateLimiterConfig,
} from './config'
import { CounterStoreFactory } from './infrastructure/counter-store'
import { RateLimiter } from './domain/services'
import { createApp } from './app'

async function main() {
  const rateLimiterConfig = RATE_LIMITER_OPTIONS.configPath
    ? loadRateLimiterConfig(RATE_LIMITER_OPTIONS.configPath)
    : DEFAULT_RATE_LIMITER_CONFIG

  const store = await CounterStoreFactory.create({
    redisUrl: REDIS_CONFIG.url,
    forceInMemory: REDIS_CONFIG.forceInMemory,
    scanCount: REDIS_CONFIG.scanCount,
    keyPrefix: REDIS_CONFIG.keyPrefix,
  })

  const limiter = new RateLimiter(rateLimiterConfig, store, {
    storeTimeoutMs: RATE_LIMITER_OPTIONS.storeTimeoutMs,
  })
  console.log(`Rate limiting endpoints: ${Object.keys(rateLimiterConfig).join(', ') || '(none)'}`)

  const server = http.createServer(createApp(limiter))

  server.listen(SERVER_CONFIG.port, () => {
    console.log(`Express server is running on port ${SERVER_CONFIG.port}`)
  })

  function shutdown() {
    server.close(() => {
      store
        .disconnect()
        .then(() => {
          console.log('Server closed gracefully')
          process.exit(0)
        })
        .catch((err: unknown) => {
          console.error('Error closing counter store:', err)
          process.exit(1)
        })
    })
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
  process.on('SIGUSR2', shutdown)
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
