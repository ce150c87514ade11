import express from 'express'
import type { Express, Request, Response } from 'express'
import type { IRateLimiter } from './domain/services/IRateLimiter'
import { rateLimitMiddleware } from './application/middleware'
import type { RateLimitMiddlewareOptions } from './application/middleware'

/**
 * Builds the HTTP app with every route behind the rate limiter.
 */
export function createApp(limiter: IRateLimiter, options: RateLimitMiddlewareOptions = {}): Express {
  const app = express()

  app.disable('x-powered-by')
  app.use(rateLimitMiddleware(limiter, options))

  app.get('/ping', (_req: Request, res: Response) => {
    res.json({ message: 'pong' })
  })

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Welcome to the rate limiter example!' })
  })

  return app
}
