import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { z } from 'zod'
import type { CredentialSource } from '../lib/auth/types.js'
import { InputError } from '../lib/errors.js'
import { parseDrivePath } from '../lib/storage/drive-path.js'
import type { StorageGateway } from '../lib/storage/types.js'
import { requireCredential } from '../middleware/auth.js'
import { drivePage } from '../views/pages.js'

// Failed validation goes through the shared error page
const rejectInvalid = (result: { success: boolean; error?: z.ZodError }) => {
  if (!result.success) {
    throw new InputError(result.error?.issues[0]?.message ?? 'Invalid request')
  }
}

const UploadSchema = z.object({
  // Browsers send an unnamed empty part when no file was chosen
  file: z
    .instanceof(File, { message: 'Choose a file to upload' })
    .refine((file) => file.name !== '', 'Choose a file to upload'),
  remote: z.string().trim().optional(),
})

const FolderSchema = z.object({
  path: z.string({ required_error: 'Folder path is required' }).trim().min(1, 'Folder path is required'),
})

const ItemQuerySchema = z.object({
  path: z.string({ required_error: 'path is required' }).min(1, 'path is required'),
})

/**
 * ASCII fallback plus RFC 5987 form for names outside it
 */
function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_')
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`
}

export function createDriveRoutes(drive: StorageGateway, credentials: CredentialSource) {
  const app = new Hono()
  const signedIn = requireCredential(credentials)

  // GET / - drive listing
  app.get('/', signedIn, async (c) => {
    const items = await drive.listChildren()
    return c.html(drivePage(items, credentials.snapshot()))
  })

  // POST /upload
  app.post('/upload', signedIn, zValidator('form', UploadSchema, rejectInvalid), async (c) => {
    const { file, remote } = c.req.valid('form')
    const remotePath = remote || `/${file.name}`

    const bytes = Buffer.from(await file.arrayBuffer())
    await drive.uploadContent(remotePath, bytes)
    console.log(`[DRIVE] Uploaded ${bytes.length} bytes to ${remotePath}`)

    return c.redirect('/')
  })

  // POST /mkdir
  app.post('/mkdir', signedIn, zValidator('form', FolderSchema, rejectInvalid), async (c) => {
    const { path } = c.req.valid('form')
    const folder = await drive.createFolder(path)
    console.log(`[DRIVE] Created folder ${folder.name} for ${path}`)
    return c.redirect('/')
  })

  // GET /delete
  app.get('/delete', signedIn, zValidator('query', ItemQuerySchema, rejectInvalid), async (c) => {
    const { path } = c.req.valid('query')
    await drive.deleteItem(path)
    console.log(`[DRIVE] Deleted ${path}`)
    return c.redirect('/')
  })

  // GET /download
  app.get('/download', signedIn, zValidator('query', ItemQuerySchema, rejectInvalid), async (c) => {
    const { path } = c.req.valid('query')
    const { name } = parseDrivePath(path)
    const content = await drive.downloadContent(path)

    return c.body(new Uint8Array(content), 200, {
      'Content-Type': 'application/octet-stream',
      'Content-Disposition': contentDisposition(name),
    })
  })

  return app
}
