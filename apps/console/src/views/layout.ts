import { html, raw } from 'hono/html'
import type { HtmlEscapedString } from 'hono/utils/html'

export type Markup = HtmlEscapedString | Promise<HtmlEscapedString>

const styles = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 760px; margin: 32px auto; padding: 0 16px; color: #222; }
  h1 { font-size: 22px; }
  h2 { font-size: 17px; margin-top: 28px; }
  ul.items { list-style: none; padding: 0; }
  ul.items li { padding: 6px 0; border-bottom: 1px solid #eee; }
  .kind { color: #777; font-size: 13px; }
  .actions a { margin-left: 10px; font-size: 13px; }
  .code { font-family: monospace; font-size: 24px; letter-spacing: 3px; }
  .error { color: #c00; }
  form { margin: 8px 0; }
`

export function layout(title: string, body: Markup, options: { refreshSeconds?: number } = {}): Markup {
  return html`<!doctype html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${title}</title>
    ${options.refreshSeconds ? html`<meta http-equiv="refresh" content="${options.refreshSeconds}">` : ''}
    <style>${raw(styles)}</style>
  </head>
  <body>
    ${body}
  </body>
</html>`
}
