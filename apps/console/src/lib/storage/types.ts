/**
 * Drive storage abstraction used by the console routes
 */

export interface DriveItem {
  name: string
  isFolder: boolean
  /** Display path, `/` + name */
  path: string
  size: number | null
}

export interface StorageGateway {
  /**
   * List the items directly under the drive root
   */
  listChildren(): Promise<DriveItem[]>

  /**
   * Create or replace the file at remotePath
   */
  uploadContent(remotePath: string, bytes: Buffer): Promise<DriveItem>

  /**
   * Create a folder; the server renames it on a name collision
   */
  createFolder(path: string): Promise<DriveItem>

  deleteItem(path: string): Promise<void>

  downloadContent(path: string): Promise<Buffer>
}
