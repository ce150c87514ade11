import type { RequestHandler } from 'express'
import type { IRateLimiter } from '../../domain/services/IRateLimiter'
import type { IdentityResolver, PathSanitizer } from './requestKeys'
import { resolveClientIdentity, sanitizePath } from './requestKeys'

export const TOO_MANY_REQUESTS = 429

export const RATE_LIMIT_EXCEEDED_BODY = Object.freeze({ error: 'Rate limit exceeded' })

export interface RateLimitMiddlewareOptions {
  sanitizePath?: PathSanitizer
  resolveIdentity?: IdentityResolver
}

/**
 * Express middleware that asks the limiter before letting a request through.
 * The endpoint is derived from `req.originalUrl`, so a mount path stays part of it.
 * Rejected requests get 429 and never reach downstream handlers.
 * Store calls stop waiting once the client connection closes.
 */
export function rateLimitMiddleware(
  limiter: IRateLimiter,
  options: RateLimitMiddlewareOptions = {}
): RequestHandler {
  const toEndpoint = options.sanitizePath ?? sanitizePath
  const toIdentity = options.resolveIdentity ?? resolveClientIdentity

  return (req, res, next) => {
    const endpoint = toEndpoint(req.originalUrl)
    const userId = toIdentity(req)

    const controller = new AbortController()
    const onClose = () => controller.abort(new Error('Client closed the connection'))
    res.on('close', onClose)

    limiter.allowRequest(endpoint, userId, { signal: controller.signal }).then(
      (allowed) => {
        res.off('close', onClose)
        if (!allowed) {
          res.status(TOO_MANY_REQUESTS).json(RATE_LIMIT_EXCEEDED_BODY)
          return
        }
        next()
      },
      (error: unknown) => {
        res.off('close', onClose)
        next(error)
      }
    )
  }
}
