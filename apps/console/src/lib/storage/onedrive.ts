import { Client, GraphError, ResponseType } from '@microsoft/microsoft-graph-client'
import type { AuthenticationProvider } from '@microsoft/microsoft-graph-client'
import { z } from 'zod'
import { RemoteError } from '../errors.js'
import type { CredentialSource } from '../auth/types.js'
import { encodeDrivePath, parseDrivePath } from './drive-path.js'
import type { DriveItem, StorageGateway } from './types.js'

const GraphDriveItemSchema = z.object({
  name: z.string(),
  folder: z.object({}).passthrough().optional(),
  size: z.number().optional(),
})

const GraphChildrenSchema = z.object({
  value: z.array(GraphDriveItemSchema).default([]),
})

type GraphDriveItem = z.infer<typeof GraphDriveItemSchema>

function toDriveItem(item: GraphDriveItem): DriveItem {
  return {
    name: item.name,
    isFolder: item.folder !== undefined,
    path: `/${item.name}`,
    size: item.size ?? null,
  }
}

export interface OneDriveGatewayOptions {
  credentials: CredentialSource
  /** `/me/drive` or `/users/{id}/drive` */
  driveRoot: string
}

/**
 * Storage gateway over Microsoft Graph. One Graph request per operation.
 */
export class OneDriveGateway implements StorageGateway {
  readonly driveRoot: string
  private readonly credentials: CredentialSource
  private readonly client: Client

  constructor({ credentials, driveRoot }: OneDriveGatewayOptions) {
    this.driveRoot = driveRoot
    this.credentials = credentials

    const authProvider: AuthenticationProvider = {
      getAccessToken: async () => (await credentials.acquireToken()).accessToken,
    }
    this.client = Client.initWithMiddleware({ authProvider })
  }

  async listChildren(): Promise<DriveItem[]> {
    const response = await this.send('list children', () =>
      this.client.api(`${this.driveRoot}/root/children`).get()
    )
    return GraphChildrenSchema.parse(response ?? {}).value.map(toDriveItem)
  }

  async uploadContent(remotePath: string, bytes: Buffer): Promise<DriveItem> {
    const target = parseDrivePath(remotePath)
    const response = await this.send(`upload ${target.path}`, () =>
      this.client
        .api(`${this.itemAddress(target.segments)}/content`)
        .header('Content-Type', 'application/octet-stream')
        .put(bytes)
    )
    return toDriveItem(GraphDriveItemSchema.parse(response))
  }

  async createFolder(path: string): Promise<DriveItem> {
    const target = parseDrivePath(path)
    const parentAddress = target.parent
      ? this.itemAddress(target.segments.slice(0, -1))
      : `${this.driveRoot}/root`

    const response = await this.send(`create folder ${target.path}`, () =>
      this.client.api(`${parentAddress}/children`).post({
        name: target.name,
        folder: {},
        '@microsoft.graph.conflictBehavior': 'rename',
      })
    )
    return toDriveItem(GraphDriveItemSchema.parse(response))
  }

  async deleteItem(path: string): Promise<void> {
    const target = parseDrivePath(path)
    await this.send(`delete ${target.path}`, () =>
      this.client.api(`${this.itemAddress(target.segments)}/`).delete()
    )
  }

  async downloadContent(path: string): Promise<Buffer> {
    const target = parseDrivePath(path)
    const body = await this.send(`download ${target.path}`, () =>
      this.client
        .api(`${this.itemAddress(target.segments)}/content`)
        .responseType(ResponseType.ARRAYBUFFER)
        .get()
    )

    if (!(body instanceof ArrayBuffer)) {
      throw new RemoteError(502, null, `Download of ${target.path} returned no content`)
    }
    return Buffer.from(body)
  }

  /**
   * Path-addressed item, `{root}/root:/a/b:`
   */
  private itemAddress(segments: string[]): string {
    return `${this.driveRoot}/root:${encodeDrivePath(segments)}:`
  }

  private async send(operation: string, request: () => Promise<unknown>): Promise<unknown> {
    // Sign-in failures surface as AuthError here rather than wrapped in a GraphError
    await this.credentials.acquireToken()

    try {
      return await request()
    } catch (err) {
      if (err instanceof GraphError) {
        console.error(`[DRIVE] ${operation} failed (${err.statusCode}):`, err.message)
        throw new RemoteError(err.statusCode, err.code, err.message || `OneDrive could not ${operation}`)
      }
      throw err
    }
  }
}

/**
 * Drive root for the configured mode: the signed-in user's own drive, or the
 * impersonated user's drive for app-only access.
 */
export function driveRootFor(config: { mode: 'device' } | { mode: 'app'; targetUser: string }): string {
  return config.mode === 'app' ? `/users/${config.targetUser}/drive` : '/me/drive'
}
