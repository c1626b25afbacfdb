import type { MiddlewareHandler } from 'hono'
import type { CredentialSource } from '../lib/auth/types.js'

/**
 * Middleware that makes sure a credential is held before a drive action runs.
 *
 * Device mode never waits on the user inside a request: the sign-in is started in the
 * background and the browser is sent to /auth, which polls until it completes.
 * App mode has no user step, so the exchange is awaited here and an AuthError
 * propagates to the error handler.
 */
export function requireCredential(credentials: CredentialSource): MiddlewareHandler {
  return async (c, next) => {
    if (credentials.mode === 'device' && !credentials.hasCredential()) {
      credentials.begin()
      return c.redirect('/auth')
    }

    await credentials.acquireToken()
    await next()
  }
}
