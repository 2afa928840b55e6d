import type { MiddlewareHandler } from 'hono'
import type { TransportAuth } from '@gatewire/core'
import { basicAuthHeader } from '@gatewire/core'

/**
 * Create auth middleware
 * @param credentials - Basic credentials every request must carry; open access when unset
 */
export function createAuthMiddleware(credentials?: TransportAuth): MiddlewareHandler {
  const expected = credentials ? basicAuthHeader(credentials) : null

  return async (c, next) => {
    if (expected !== null && c.req.header('Authorization') !== expected) {
      return c.json({ error: 'Unauthorized' }, 401)
    }

    await next()
  }
}
