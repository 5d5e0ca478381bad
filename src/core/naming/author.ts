import { hasEditionMarker } from './abbreviate'
import { isNoise, normalizeField } from './normalize'
import { UNKNOWN_AUTHOR } from './types'

export type AuthorSource = 'metadata' | 'filename' | 'sentinel'

export interface AuthorChoice {
  author: string
  source: AuthorSource
}

const HONORIFICS = /(?<!\p{L})(?:Ph\.?D\.?|M\.D\.|MD)(?!\p{L})/giu
const AUTHOR_DELIMITER =
  /\s*(?:[,;&]|(?<![\p{L}\p{N}])and(?![\p{L}\p{N}]))\s*/iu
const LEADING_DELIMITERS = /^[\s,;&]+/
const PARENTHESIZED = /\(([^)]{2,})\)/g
const BARE_NUMBER = /^[\s\d._-]*$/
const YEAR_SEGMENT = /^(?:[12]\d{3}|UnknownYear)$/i
const NAME_TOKEN = /^\p{Lu}[\p{L}.'’-]*$/u

/** First author of `Jane Doe, John Smith` or `Jane Doe and John Smith` */
export function firstAuthor(raw: string): string {
  const value = raw.replace(HONORIFICS, ' ').replace(LEADING_DELIMITERS, '')
  const [first = ''] = value.split(AUTHOR_DELIMITER)
  return first.trim()
}

export function authorFromParentheses(stem: string): string | null {
  for (const match of stem.matchAll(PARENTHESIZED)) {
    const group = match[1].trim()
    if (!group || isNoise(group) || BARE_NUMBER.test(group)) continue
    if (hasEditionMarker(group)) continue

    const [candidate = ''] = group.split(/\s*[,;]\s*/)
    if (candidate.trim()) return candidate.trim()
  }
  return null
}

/**
 * Reads the author back out of a stem this tool produced earlier, such as
 * `Clean_Code-Robert_Martin-2008`.
 */
export function authorFromTrailingSegment(stem: string): string | null {
  const parts = stem
    .split(/-+/)
    .map(part => part.trim())
    .filter(Boolean)
  let idx = parts.length - 1
  if (idx >= 0 && YEAR_SEGMENT.test(parts[idx])) idx -= 1
  // The segment before it has to remain as the title.
  if (idx < 1) return null

  const candidate = parts[idx].replace(/[_\s]+/g, ' ').trim()
  if (candidate.toLowerCase() === UNKNOWN_AUTHOR.toLowerCase()) return null
  const tokens = candidate.split(' ').filter(Boolean)
  if (tokens.length < 1 || tokens.length > 3) return null
  if (!tokens.every(token => NAME_TOKEN.test(token))) return null
  if (tokens.length === 1 && tokens[0].length < 4) return null
  return candidate
}

interface AuthorTier {
  source: AuthorSource
  pick: (metaAuthors: string | undefined, stem: string) => string | null
}

const AUTHOR_TIERS: readonly AuthorTier[] = [
  {
    source: 'metadata',
    pick: metaAuthors =>
      metaAuthors === undefined ? null : firstAuthor(metaAuthors)
  },
  { source: 'filename', pick: (_meta, stem) => authorFromParentheses(stem) },
  { source: 'filename', pick: (_meta, stem) => authorFromTrailingSegment(stem) }
]

export function chooseAuthor(
  metaAuthors: string | undefined,
  filenameStem: string
): AuthorChoice {
  for (const tier of AUTHOR_TIERS) {
    const raw = tier.pick(metaAuthors, filenameStem)
    if (raw === null) continue
    const author = normalizeField(raw.replace(/\s+/g, '_'))
    if (author) return { author, source: tier.source }
  }
  return { author: UNKNOWN_AUTHOR, source: 'sentinel' }
}

export function resolveAuthor(
  metaAuthors: string | undefined,
  filenameStem: string
): string {
  return chooseAuthor(metaAuthors, filenameStem).author
}
