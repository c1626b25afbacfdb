export * from './types.js'
export { CredentialProvider, APP_SCOPES, DEVICE_SCOPES } from './credential-provider.js'
