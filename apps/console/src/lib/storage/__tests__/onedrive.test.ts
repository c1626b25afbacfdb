import { describe, it, expect, vi, beforeEach } from 'vitest'

const graph = vi.hoisted(() => ({
  initWithMiddleware: vi.fn(),
}))

vi.mock('@microsoft/microsoft-graph-client', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@microsoft/microsoft-graph-client')>()),
  Client: { initWithMiddleware: graph.initWithMiddleware },
}))

import { OneDriveGateway, driveRootFor } from '../onedrive.js'
import { AuthError, InputError, RemoteError } from '../../errors.js'
import { FakeDrive } from '../../../test/mocks/microsoft-graph.js'
import { createMockCredentials, type MockCredentials } from '../../../test/mocks/credentials.js'

describe('OneDriveGateway', () => {
  let drive: FakeDrive
  let credentials: MockCredentials
  let gateway: OneDriveGateway

  beforeEach(() => {
    drive = new FakeDrive('/me/drive')
    graph.initWithMiddleware.mockReturnValue(drive)
    credentials = createMockCredentials('device')
    gateway = new OneDriveGateway({ credentials, driveRoot: '/me/drive' })
  })

  describe('client setup', () => {
    it('authorizes Graph requests with the held credential', async () => {
      expect(graph.initWithMiddleware).toHaveBeenCalledTimes(1)
      const [{ authProvider }] = graph.initWithMiddleware.mock.calls[0]

      await expect(authProvider.getAccessToken()).resolves.toBe('test-access-token')
      expect(credentials.acquireToken).toHaveBeenCalledTimes(1)
    })
  })

  describe('listChildren', () => {
    it('returns an empty list for an empty drive', async () => {
      await expect(gateway.listChildren()).resolves.toEqual([])
      expect(drive.requests).toEqual([
        { method: 'GET', path: '/me/drive/root/children', headers: {} },
      ])
    })

    it('projects files and folders in drive order', async () => {
      drive.addFolder('/Documents').addFile('/notes.txt', 'hello')

      const items = await gateway.listChildren()

      expect(items).toEqual([
        { name: 'Documents', isFolder: true, path: '/Documents', size: null },
        { name: 'notes.txt', isFolder: false, path: '/notes.txt', size: 5 },
      ])
    })

    it('only lists items directly under the root', async () => {
      drive.addFolder('/Documents').addFile('/Documents/nested.txt', 'x')

      const items = await gateway.listChildren()

      expect(items.map((item) => item.name)).toEqual(['Documents'])
    })

    it('treats a response without value as empty', async () => {
      drive.respondNext({})

      await expect(gateway.listChildren()).resolves.toEqual([])
    })

    it('surfaces a Graph failure as RemoteError', async () => {
      drive.failNext(403, 'accessDenied', 'Access denied')

      const error = await gateway.listChildren().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(RemoteError)
      expect(error).toMatchObject({ status: 403, code: 'accessDenied', message: 'Access denied' })
    })

    it('surfaces a sign-in failure as AuthError without calling Graph', async () => {
      credentials.acquireToken.mockRejectedValueOnce(new AuthError('Sign-in (device) failed: denied'))

      await expect(gateway.listChildren()).rejects.toBeInstanceOf(AuthError)
      expect(drive.requests).toHaveLength(0)
    })
  })

  describe('uploadContent', () => {
    it('puts raw bytes to the path-addressed content endpoint', async () => {
      const item = await gateway.uploadContent('/x.txt', Buffer.from('hello'))

      expect(item).toEqual({ name: 'x.txt', isFolder: false, path: '/x.txt', size: 5 })
      expect(drive.requests).toHaveLength(1)
      expect(drive.requests[0]).toMatchObject({
        method: 'PUT',
        path: '/me/drive/root:/x.txt:/content',
        headers: { 'Content-Type': 'application/octet-stream' },
      })
    })

    it('round-trips content through download', async () => {
      await gateway.uploadContent('/x.txt', Buffer.from('hello'))

      const content = await gateway.downloadContent('/x.txt')

      expect(content).toEqual(Buffer.from('hello'))
    })

    it('replaces existing content', async () => {
      drive.addFile('/x.txt', 'old')

      await gateway.uploadContent('/x.txt', Buffer.from('new content'))

      await expect(gateway.downloadContent('/x.txt')).resolves.toEqual(Buffer.from('new content'))
    })

    it('percent-encodes path segments', async () => {
      await gateway.uploadContent('/My Files/a#1.txt', Buffer.from('data'))

      expect(drive.requests[0].path).toBe('/me/drive/root:/My%20Files/a%231.txt:/content')
      expect(drive.has('/My Files/a#1.txt')).toBe(true)
    })

    it('rejects traversal before any request is made', async () => {
      await expect(gateway.uploadContent('/../secrets.txt', Buffer.from('x'))).rejects.toBeInstanceOf(InputError)
      expect(drive.requests).toHaveLength(0)
      expect(credentials.acquireToken).not.toHaveBeenCalled()
    })
  })

  describe('createFolder', () => {
    it('posts to the parent children endpoint with the leaf name', async () => {
      drive.addFolder('/a')

      const folder = await gateway.createFolder('/a/b')

      expect(folder).toEqual({ name: 'b', isFolder: true, path: '/b', size: null })
      expect(drive.requests[0]).toEqual({
        method: 'POST',
        path: '/me/drive/root:/a:/children',
        headers: {},
        body: { name: 'b', folder: {}, '@microsoft.graph.conflictBehavior': 'rename' },
      })
    })

    it('posts to the root children endpoint when there is no parent', async () => {
      await gateway.createFolder('/b')

      expect(drive.requests[0]).toMatchObject({
        method: 'POST',
        path: '/me/drive/root/children',
        body: { name: 'b', folder: {}, '@microsoft.graph.conflictBehavior': 'rename' },
      })
      expect(drive.has('/b')).toBe(true)
    })

    it('ignores a trailing slash', async () => {
      drive.addFolder('/a')

      await gateway.createFolder('/a/b/')

      expect(drive.requests[0]).toMatchObject({
        path: '/me/drive/root:/a:/children',
        body: { name: 'b' },
      })
    })

    it('returns the renamed folder on a name collision', async () => {
      drive.addFolder('/b')

      const folder = await gateway.createFolder('/b')

      expect(folder.name).toBe('b 1')
    })

    it('surfaces a missing parent as RemoteError', async () => {
      await expect(gateway.createFolder('/missing/b')).rejects.toMatchObject({
        name: 'RemoteError',
        status: 404,
      })
    })

    it('rejects the drive root itself', async () => {
      await expect(gateway.createFolder('/')).rejects.toBeInstanceOf(InputError)
      expect(drive.requests).toHaveLength(0)
    })
  })

  describe('deleteItem', () => {
    it('deletes the path-addressed item', async () => {
      drive.addFile('/old.txt', 'bye')

      await gateway.deleteItem('/old.txt')

      expect(drive.requests[0]).toEqual({
        method: 'DELETE',
        path: '/me/drive/root:/old.txt:/',
        headers: {},
      })
      expect(drive.has('/old.txt')).toBe(false)
    })

    it('surfaces a missing item as RemoteError', async () => {
      const error = await gateway.deleteItem('/nope.txt').catch((err: unknown) => err)

      expect(error).toBeInstanceOf(RemoteError)
      expect(error).toMatchObject({ status: 404, code: 'itemNotFound' })
    })
  })

  describe('downloadContent', () => {
    it('reads bytes from the content endpoint', async () => {
      drive.addFile('/Documents/notes.txt', 'some notes')

      const content = await gateway.downloadContent('/Documents/notes.txt')

      expect(content.toString()).toBe('some notes')
      expect(drive.requests[0]).toMatchObject({
        method: 'GET',
        path: '/me/drive/root:/Documents/notes.txt:/content',
      })
    })

    it('surfaces a missing file as RemoteError', async () => {
      await expect(gateway.downloadContent('/nope.txt')).rejects.toBeInstanceOf(RemoteError)
    })
  })

  describe('impersonated drive', () => {
    it('addresses the target user drive', async () => {
      const userDrive = new FakeDrive('/users/user@example.com/drive').addFile('/a.txt', 'a')
      graph.initWithMiddleware.mockReturnValue(userDrive)
      const appGateway = new OneDriveGateway({
        credentials: createMockCredentials('app'),
        driveRoot: driveRootFor({ mode: 'app', targetUser: 'user@example.com' }),
      })

      const items = await appGateway.listChildren()

      expect(items).toEqual([{ name: 'a.txt', isFolder: false, path: '/a.txt', size: 1 }])
      expect(userDrive.requests[0].path).toBe('/users/user@example.com/drive/root/children')
    })
  })
})

describe('driveRootFor', () => {
  it('uses the signed-in user drive in device mode', () => {
    expect(driveRootFor({ mode: 'device' })).toBe('/me/drive')
  })

  it('uses the target user drive in app mode', () => {
    expect(driveRootFor({ mode: 'app', targetUser: 'user@example.com' })).toBe('/users/user@example.com/drive')
  })
})
