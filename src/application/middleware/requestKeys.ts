import type { IncomingHttpHeaders } from 'http'

/**
 * Maps a raw request URL to the endpoint key used for rate limiting.
 * Replace it to match the application's routing structure.
 */
export type PathSanitizer = (path: string) => string

export interface IdentitySource {
  headers: IncomingHttpHeaders
  socket: { remoteAddress?: string }
}

export type IdentityResolver = (req: IdentitySource) => string

export const UNKNOWN_CLIENT = 'unknown'

/**
 * Keeps only the first path segment and drops the query string.
 * Example: "/ping/abc?x=1" → "/ping", "/" → "/"
 */
export const sanitizePath: PathSanitizer = (path) => {
  const [pathname] = path.trim().split(/[?#]/, 1)
  const [segment] = pathname.replace(/^\/+/, '').split('/', 1)
  return `/${segment}`
}

/**
 * First hop of X-Forwarded-For, falling back to the peer address.
 */
export const resolveClientIdentity: IdentityResolver = (req) => {
  const header = req.headers['x-forwarded-for']
  const forwarded = Array.isArray(header) ? header[0] : header
  const firstHop = forwarded?.split(',')[0]?.trim()

  if (firstHop) {
    return firstHop
  }
  return req.socket.remoteAddress || UNKNOWN_CLIENT
}
