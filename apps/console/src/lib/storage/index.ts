import type { AuthConfig, CredentialSource } from '../auth/types.js'
import { OneDriveGateway, driveRootFor } from './onedrive.js'
import type { StorageGateway } from './types.js'

export * from './types.js'
export { parseDrivePath, encodeDrivePath } from './drive-path.js'
export { OneDriveGateway, driveRootFor } from './onedrive.js'

/**
 * Build the gateway for the configured drive
 */
export function createStorageGateway(config: AuthConfig, credentials: CredentialSource): StorageGateway {
  return new OneDriveGateway({ credentials, driveRoot: driveRootFor(config) })
}
