import { Hono } from 'hono'
import type { CredentialSource } from '../lib/auth/types.js'
import { signInPage } from '../views/pages.js'

export function createAuthRoutes(credentials: CredentialSource) {
  const app = new Hono()

  // GET /auth - device sign-in progress
  app.get('/', (c) => {
    if (credentials.hasCredential()) {
      return c.redirect('/')
    }
    // App sign-in needs no user step; the drive routes run the exchange
    if (credentials.mode === 'app') {
      return c.redirect('/')
    }

    const snapshot = credentials.snapshot()
    if (snapshot.status === 'uninitialized' && !snapshot.error) {
      credentials.begin()
      return c.html(signInPage(credentials.snapshot()))
    }

    return c.html(signInPage(snapshot))
  })

  // GET /auth/status - polled by the sign-in page and scripts
  app.get('/status', (c) => c.json(credentials.snapshot()))

  // POST /auth/reset - drop the held credential
  app.post('/reset', (c) => {
    credentials.reset()
    console.log('[AUTH] Credential reset by operator')
    return c.redirect('/')
  })

  return app
}
