export type { PathSanitizer, IdentityResolver, IdentitySource } from './requestKeys'
export { sanitizePath, resolveClientIdentity, UNKNOWN_CLIENT } from './requestKeys'
export type { RateLimitMiddlewareOptions } from './rateLimitMiddleware'
export { rateLimitMiddleware, RATE_LIMIT_EXCEEDED_BODY, TOO_MANY_REQUESTS } from './rateLimitMiddleware'
