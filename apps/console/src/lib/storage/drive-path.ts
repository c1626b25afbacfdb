import { InputError } from '../errors.js'

// Characters OneDrive rejects in item names, plus control characters
const FORBIDDEN_CHARACTERS = /["*:<>?\\|\u0000-\u001f]/

export interface DrivePath {
  /** Canonical form: leading slash, no trailing slash */
  path: string
  segments: string[]
  name: string
  /** Canonical parent path, null for items directly under the root */
  parent: string | null
}

/**
 * Validate a user-supplied remote path and split it into segments.
 * Rejects anything that would address something other than a named item below the root.
 */
export function parseDrivePath(raw: string): DrivePath {
  const trimmed = raw.trim()
  if (!trimmed.startsWith('/')) {
    throw new InputError(`Path must start with "/": ${raw}`)
  }

  const segments = trimmed.replace(/\/+$/, '').split('/').slice(1)
  if (segments.length === 0) {
    throw new InputError('Path must name an item below the drive root')
  }

  for (const segment of segments) {
    if (segment === '') {
      throw new InputError(`Path contains an empty segment: ${raw}`)
    }
    if (segment === '.' || segment === '..') {
      throw new InputError(`Path may not contain "." or ".." segments: ${raw}`)
    }
    if (FORBIDDEN_CHARACTERS.test(segment)) {
      throw new InputError(`"${segment}" contains a character OneDrive does not allow`)
    }
  }

  return {
    path: `/${segments.join('/')}`,
    segments,
    name: segments[segments.length - 1],
    parent: segments.length > 1 ? `/${segments.slice(0, -1).join('/')}` : null,
  }
}

/**
 * Percent-encode each segment for use inside a `root:{path}:` address
 */
export function encodeDrivePath(segments: string[]): string {
  return `/${segments.map((segment) => encodeURIComponent(segment)).join('/')}`
}
