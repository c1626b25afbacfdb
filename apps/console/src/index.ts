import 'dotenv/config'
import { serve } from '@hono/node-server'

import { createApp } from './app.js'
import { loadConfig, type AppConfig } from './config.js'
import { CredentialProvider } from './lib/auth/credential-provider.js'
import { ConfigError } from './lib/errors.js'
import { createStorageGateway } from './lib/storage/index.js'

function readConfig(): AppConfig {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`ERROR: ${err.message}`)
      process.exit(1)
    }
    throw err
  }
}

const config = readConfig()

const credentials = new CredentialProvider({
  config: config.auth,
  deviceLoginTimeoutMs: config.deviceLoginTimeoutMs,
  onDeviceCode: (prompt) => {
    console.log('[AUTH] ==== DEVICE LOGIN ====')
    console.log(`[AUTH] ${prompt.message}`)
  },
})
const drive = createStorageGateway(config.auth, credentials)
const app = createApp({ credentials, drive })

serve({
  fetch: app.fetch,
  port: config.port,
}, (info) => {
  console.log(`OneDrive console running on http://localhost:${info.port} (${config.auth.mode} sign-in)`)
})
