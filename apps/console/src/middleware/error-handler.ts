import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { AuthError, InputError, RemoteError } from '../lib/errors.js'
import { errorPage } from '../views/pages.js'

// Remote statuses passed through to the browser; anything else is reported as a bad gateway
const PASS_THROUGH_STATUSES = [400, 403, 404, 409, 413, 423] as const

function responseStatusFor(err: RemoteError) {
  return PASS_THROUGH_STATUSES.find((status) => status === err.status) ?? 502
}

/**
 * Renders each error category as its own page
 */
export function handleError(err: Error, c: Context) {
  if (err instanceof InputError) {
    return c.html(errorPage('Invalid request', err.message), 400)
  }

  if (err instanceof AuthError) {
    console.error('[AUTH]', err.message)
    return c.html(errorPage('Sign-in failed', err.message, { signInLink: true }), 401)
  }

  if (err instanceof RemoteError) {
    return c.html(errorPage('OneDrive request failed', err.message), responseStatusFor(err))
  }

  if (err instanceof HTTPException) {
    return err.getResponse()
  }

  console.error('[APP] Unhandled error:', err)
  return c.html(errorPage('Something went wrong', 'The request could not be completed.'), 500)
}
