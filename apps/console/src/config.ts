import { z } from 'zod'
import { ConfigError } from './lib/errors.js'
import type { AuthConfig } from './lib/auth/types.js'

export interface AppConfig {
  auth: AuthConfig
  port: number
  deviceLoginTimeoutMs: number
}

// Blank entries in .env behave as if the key were not set
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const requiredSetting = (key: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${key} is required` }).trim())

const optionalSetting = z.preprocess(blankToUndefined, z.string().trim().optional())

// Longest delay a Node timer accepts, in whole seconds
const MAX_TIMER_SECONDS = 2147483

const EnvSchema = z.object({
  AUTH_FLOW: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
    z
      .enum(['device', 'app'], { errorMap: () => ({ message: 'AUTH_FLOW must be "device" or "app"' }) })
      .default('device')
  ),
  CLIENT_ID: requiredSetting('CLIENT_ID'),
  TENANT_ID: requiredSetting('TENANT_ID'),
  CLIENT_SECRET: optionalSetting,
  TARGET_USER: optionalSetting,
  PORT: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'PORT must be a number' })
      .int('PORT must be an integer')
      .min(1, 'PORT must be between 1 and 65535')
      .max(65535, 'PORT must be between 1 and 65535')
      .default(5000)
  ),
  DEVICE_LOGIN_TIMEOUT_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'DEVICE_LOGIN_TIMEOUT_SECONDS must be a number' })
      .positive('DEVICE_LOGIN_TIMEOUT_SECONDS must be positive')
      .max(MAX_TIMER_SECONDS, `DEVICE_LOGIN_TIMEOUT_SECONDS must be at most ${MAX_TIMER_SECONDS}`)
      .default(900)
  ),
})

type Env = z.infer<typeof EnvSchema>

function resolveAuthConfig(env: Env): AuthConfig {
  if (env.AUTH_FLOW === 'device') {
    return { mode: 'device', clientId: env.CLIENT_ID, tenantId: env.TENANT_ID }
  }

  const { CLIENT_SECRET: clientSecret, TARGET_USER: targetUser } = env
  if (!clientSecret || !targetUser) {
    const issues: string[] = []
    if (!clientSecret) issues.push('CLIENT_SECRET is required when AUTH_FLOW=app')
    if (!targetUser) issues.push('TARGET_USER is required when AUTH_FLOW=app')
    throw new ConfigError(issues)
  }

  return {
    mode: 'app',
    clientId: env.CLIENT_ID,
    tenantId: env.TENANT_ID,
    clientSecret,
    targetUser,
  }
}

/**
 * Load and validate configuration from the environment.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message))
  }

  return {
    auth: resolveAuthConfig(result.data),
    port: result.data.PORT,
    deviceLoginTimeoutMs: result.data.DEVICE_LOGIN_TIMEOUT_SECONDS * 1000,
  }
}
