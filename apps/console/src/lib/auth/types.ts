/**
 * Credential types shared by the provider, the drive gateway and the console
 */

export type AuthMode = 'device' | 'app'

export type AuthConfig =
  | {
      mode: 'device'
      clientId: string
      tenantId: string
    }
  | {
      mode: 'app'
      clientId: string
      tenantId: string
      clientSecret: string
      targetUser: string
    }

export interface Credential {
  accessToken: string
  expiresAt: number // epoch ms
  mode: AuthMode
}

export interface DeviceCodePrompt {
  userCode: string
  verificationUri: string
  message: string
}

export type CredentialState =
  | { status: 'uninitialized' }
  | { status: 'acquiring' }
  | { status: 'awaiting-user-verification'; prompt: DeviceCodePrompt }
  | { status: 'cached'; credential: Credential }

export type CredentialStatus = CredentialState['status']

/**
 * What the console may show about the credential. Never carries the token.
 */
export interface CredentialSnapshot {
  mode: AuthMode
  status: CredentialStatus
  prompt?: DeviceCodePrompt
  expiresAt?: string
  error?: string
}

export interface CredentialSource {
  readonly mode: AuthMode
  acquireToken(): Promise<Credential>
  hasCredential(): boolean
  begin(): void
  reset(): void
  snapshot(): CredentialSnapshot
}
