import type { Context, MiddlewareHandler, Next } from 'hono'

/**
 * Admin API authentication middleware
 * Accepts a Bearer token matching one of the configured admin API keys.
 * With no keys configured the admin endpoints stay open (a warning is logged per request).
 */
export function createAdminAuth(apiKeys: string[]): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    if (apiKeys.length === 0) {
      console.warn('[Auth] ADMIN_APIKEYS not configured, admin endpoints are unprotected!')
      await next()
      return
    }

    const authHeader = c.req.header('Authorization')

    if (!authHeader) {
      return c.json({
        error: 'Unauthorized',
        message: 'Missing Authorization header'
      }, 401)
    }

    const parts = authHeader.split(' ')
    if (parts.length !== 2 || parts[0] !== 'Bearer') {
      return c.json({
        error: 'Unauthorized',
        message: 'Invalid Authorization header format. Expected: Bearer <token>'
      }, 401)
    }

    if (!apiKeys.includes(parts[1])) {
      return c.json({
        error: 'Unauthorized',
        message: 'Invalid API key'
      }, 401)
    }

    await next()
  }
}
