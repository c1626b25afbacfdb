import { Hono } from 'hono'
import { logger } from 'hono/logger'
import type { CredentialSource } from './lib/auth/types.js'
import type { StorageGateway } from './lib/storage/types.js'
import { handleError } from './middleware/error-handler.js'
import { createAuthRoutes } from './routes/auth.js'
import { createDriveRoutes } from './routes/drive.js'

export interface AppDependencies {
  credentials: CredentialSource
  drive: StorageGateway
  /** Request logging, on by default */
  requestLogging?: boolean
}

export function createApp({ credentials, drive, requestLogging = true }: AppDependencies) {
  const app = new Hono()

  // Middleware
  if (requestLogging) {
    app.use('*', logger())
  }

  // Health check (no sign-in required)
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }))

  // Mount routes
  app.route('/auth', createAuthRoutes(credentials))
  app.route('/', createDriveRoutes(drive, credentials))

  app.onError(handleError)

  return app
}
