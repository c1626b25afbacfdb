import { ClientSecretCredential, DeviceCodeCredential } from '@azure/identity'
import type { DeviceCodeInfo, TokenCredential } from '@azure/identity'
import { AuthError } from '../errors.js'
import type {
  AuthConfig,
  AuthMode,
  Credential,
  CredentialSnapshot,
  CredentialSource,
  CredentialState,
  DeviceCodePrompt,
} from './types.js'

export const APP_SCOPES = ['https://graph.microsoft.com/.default']
export const DEVICE_SCOPES = ['Files.ReadWrite.All', 'User.Read', 'offline_access']

// Treat the token as expired a minute early
const EXPIRY_BUFFER_MS = 60 * 1000

const DEFAULT_DEVICE_LOGIN_TIMEOUT_MS = 15 * 60 * 1000

export interface CredentialProviderOptions {
  config: AuthConfig
  deviceLoginTimeoutMs?: number
  /** Operator channel for the device-code instructions */
  onDeviceCode?: (prompt: DeviceCodePrompt) => void
  now?: () => number
}

/**
 * Holds the single bearer credential of the process.
 *
 * - Held and fresh: returned unchanged
 * - Acquisition in flight: callers share it
 * - Otherwise: a new exchange for the configured mode
 */
export class CredentialProvider implements CredentialSource {
  private readonly config: AuthConfig
  private readonly deviceLoginTimeoutMs: number
  private readonly onDeviceCode: (prompt: DeviceCodePrompt) => void
  private readonly now: () => number

  private state: CredentialState = { status: 'uninitialized' }
  private lastError: AuthError | null = null
  private inFlight: Promise<Credential> | null = null
  private tokenCredential: TokenCredential | null = null

  constructor(options: CredentialProviderOptions) {
    this.config = options.config
    this.deviceLoginTimeoutMs = options.deviceLoginTimeoutMs ?? DEFAULT_DEVICE_LOGIN_TIMEOUT_MS
    this.onDeviceCode = options.onDeviceCode ?? (() => {})
    this.now = options.now ?? Date.now
  }

  get mode(): AuthMode {
    return this.config.mode
  }

  async acquireToken(): Promise<Credential> {
    const held = this.currentCredential()
    if (held) {
      return held
    }

    if (this.inFlight) {
      return this.inFlight
    }

    this.inFlight = this.requestCredential()
    try {
      return await this.inFlight
    } finally {
      this.inFlight = null
    }
  }

  /**
   * Start acquiring without waiting for it. Used by the console so the device-code
   * wait never holds a request open.
   */
  begin(): void {
    if (this.hasCredential() || this.inFlight) {
      return
    }
    this.acquireToken().catch((err) => {
      console.error('[AUTH] Background sign-in failed:', err instanceof Error ? err.message : err)
    })
  }

  hasCredential(): boolean {
    return this.currentCredential() !== null
  }

  reset(): void {
    // An acquisition already in flight is left to finish
    if (this.state.status === 'cached') {
      this.state = { status: 'uninitialized' }
    }
    this.lastError = null
    // Drop the identity client with its token cache so the next sign-in prompts again
    this.tokenCredential = null
  }

  snapshot(): CredentialSnapshot {
    const snapshot: CredentialSnapshot = { mode: this.mode, status: this.state.status }

    if (this.state.status === 'awaiting-user-verification') {
      snapshot.prompt = this.state.prompt
    }
    if (this.state.status === 'cached') {
      snapshot.expiresAt = new Date(this.state.credential.expiresAt).toISOString()
    }
    if (this.lastError) {
      snapshot.error = this.lastError.message
    }

    return snapshot
  }

  private currentCredential(): Credential | null {
    if (this.state.status !== 'cached') {
      return null
    }
    if (this.now() >= this.state.credential.expiresAt - EXPIRY_BUFFER_MS) {
      this.state = { status: 'uninitialized' }
      return null
    }
    return this.state.credential
  }

  private async requestCredential(): Promise<Credential> {
    this.state = { status: 'acquiring' }

    try {
      const tokenCredential = this.getTokenCredential()
      const token =
        this.config.mode === 'app'
          ? await tokenCredential.getToken(APP_SCOPES)
          : await tokenCredential.getToken(DEVICE_SCOPES, {
              abortSignal: AbortSignal.timeout(this.deviceLoginTimeoutMs),
            })

      if (!token?.token) {
        throw new AuthError(`Sign-in (${this.config.mode}) did not return an access token`)
      }

      const credential: Credential = {
        accessToken: token.token,
        expiresAt: token.expiresOnTimestamp,
        mode: this.config.mode,
      }
      this.state = { status: 'cached', credential }
      this.lastError = null
      console.log(`[AUTH] Signed in (${this.config.mode}), token valid until ${new Date(credential.expiresAt).toISOString()}`)
      return credential
    } catch (err) {
      const authError =
        err instanceof AuthError
          ? err
          : new AuthError(`Sign-in (${this.config.mode}) failed: ${err instanceof Error ? err.message : String(err)}`, {
              cause: err,
            })
      this.state = { status: 'uninitialized' }
      this.lastError = authError
      throw authError
    }
  }

  private getTokenCredential(): TokenCredential {
    if (this.tokenCredential) {
      return this.tokenCredential
    }

    if (this.config.mode === 'app') {
      this.tokenCredential = new ClientSecretCredential(
        this.config.tenantId,
        this.config.clientId,
        this.config.clientSecret
      )
    } else {
      this.tokenCredential = new DeviceCodeCredential({
        tenantId: this.config.tenantId,
        clientId: this.config.clientId,
        userPromptCallback: (info: DeviceCodeInfo) => this.handleDeviceCode(info),
      })
    }

    return this.tokenCredential
  }

  private handleDeviceCode(info: DeviceCodeInfo): void {
    const prompt: DeviceCodePrompt = {
      userCode: info.userCode,
      verificationUri: info.verificationUri,
      message: info.message,
    }
    this.state = { status: 'awaiting-user-verification', prompt }
    this.onDeviceCode(prompt)
  }
}
