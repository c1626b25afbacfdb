import { html } from 'hono/html'
import type { CredentialSnapshot } from '../lib/auth/types.js'
import type { DriveItem } from '../lib/storage/types.js'
import { layout, type Markup } from './layout.js'

function linkWithPath(route: string, path: string): string {
  return `${route}?${new URLSearchParams({ path }).toString()}`
}

function formatSize(size: number | null): string {
  if (size === null) return ''
  if (size < 1024) return `${size} B`
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`
  return `${(size / 1024 / 1024).toFixed(1)} MB`
}

function itemRow(item: DriveItem): Markup {
  return html`<li>
    ${item.name}
    <span class="kind">${item.isFolder ? 'Folder' : `File ${formatSize(item.size)}`.trim()}</span>
    <span class="actions">
      ${item.isFolder ? '' : html`<a href="${linkWithPath('/download', item.path)}">Download</a>`}
      <a href="${linkWithPath('/delete', item.path)}">Delete</a>
    </span>
  </li>`
}

export function drivePage(items: DriveItem[], snapshot: CredentialSnapshot): Markup {
  return layout(
    'OneDrive Console',
    html`<h1>OneDrive Console</h1>
    <p>
      <a href="/">Refresh</a>
      <span class="kind">Signed in with ${snapshot.mode === 'app' ? 'app credentials' : 'device code'}</span>
    </p>
    <form action="/auth/reset" method="post"><button>Sign in again</button></form>

    <h2>Files</h2>
    ${items.length === 0
      ? html`<p class="kind">This drive is empty.</p>`
      : html`<ul class="items">${items.map(itemRow)}</ul>`}

    <h2>Upload File</h2>
    <form action="/upload" method="post" enctype="multipart/form-data">
      <input type="file" name="file">
      Remote Path: <input name="remote" placeholder="/folder/name.ext">
      <button>Upload</button>
    </form>

    <h2>Create Folder</h2>
    <form action="/mkdir" method="post">
      New Folder Path: <input name="path" placeholder="/folder">
      <button>Create Folder</button>
    </form>`
  )
}

export function signInPage(snapshot: CredentialSnapshot): Markup {
  if (snapshot.status === 'uninitialized' && snapshot.error) {
    return layout(
      'Sign in',
      html`<h1>Sign in</h1>
      <p class="error">${snapshot.error}</p>
      <p><a href="/">Try again</a></p>`
    )
  }

  if (snapshot.status === 'awaiting-user-verification' && snapshot.prompt) {
    const { prompt } = snapshot
    return layout(
      'Sign in',
      html`<h1>Sign in</h1>
      <p>Open <a href="${prompt.verificationUri}" target="_blank" rel="noopener">${prompt.verificationUri}</a> and enter the code:</p>
      <p class="code">${prompt.userCode}</p>
      <p class="kind">${prompt.message}</p>
      <p class="kind">This page refreshes until sign-in completes.</p>`,
      { refreshSeconds: 5 }
    )
  }

  return layout(
    'Sign in',
    html`<h1>Sign in</h1>
    <p>Requesting a sign-in code…</p>`,
    { refreshSeconds: 2 }
  )
}

export function errorPage(title: string, message: string, options: { signInLink?: boolean } = {}): Markup {
  return layout(
    title,
    html`<h1>${title}</h1>
    <p class="error">${message}</p>
    <p>
      <a href="/">Back to files</a>
      ${options.signInLink ? html` · <a href="/auth">Sign in</a>` : ''}
    </p>`
  )
}
