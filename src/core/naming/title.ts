import { findEditionMarkers, hasEditionMarker } from './abbreviate'
import { normalizeField, stripNoise } from './normalize'
import { UNKNOWN_AUTHOR, UNKNOWN_YEAR, UNTITLED } from './types'

/** Metadata titles shorter than this (in characters) are not trusted */
export const MIN_TITLE_LENGTH = 3
/** Metadata titles of at most this many words may be a truncated prefix */
export const SHORT_TITLE_MAX_WORDS = 2
/** Separator-free codes at least this long that contain a digit are ids */
export const OPAQUE_ID_MIN_LENGTH = 8

export type TitleSource = 'metadata' | 'filename'

export interface TitleChoice {
  title: string
  source: TitleSource
}

const ASIN = /^B[0-9A-Z]{9}(?:\s*\(.*\))?$/
const UUID =
  /^(?:urn:uuid:)?[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
const ALPHANUMERIC_CODE = /^[A-Za-z0-9]+$/
const NUMERIC_CODE = /^[\d\s-]+X?$/i
const DIGIT = /\d/
const WORD = /[\p{L}\p{N}]+/gu

const SENTINEL_TOKEN =
  /(?<![\p{L}\p{N}])Unknown(?:Year|Author)(?![\p{L}\p{N}])/giu
const PARENTHESIZED = /\(([^)]*)\)|\[([^\]]*)\]/g
const BOOK_EXTENSION = /\.(?:epub|pdf)$/i
const TRAILING_YEAR = /[\s-]+[12]\d{3}(?!\d)[\s.-]*$/
const SUBTITLE_SEPARATOR = /\s*:\s*|\s+--?\s+/
const EDGE_JUNK = /^[\s_.,;:|/–—-]+|[\s_.,;:|/–—-]+$/g
const WHITESPACE_RUN = /\s+/g
const SEP = '[\\s_,:|/–—-]*'
const START = '(?<![\\p{L}\\p{N}])'
const END = "(?![\\p{L}\\p{N}'’])"

export function countWords(text: string | undefined): number {
  if (!text) return 0
  return text.match(WORD)?.length ?? 0
}

export function isOpaqueIdentifier(title: string): boolean {
  const value = title.trim()
  if (ASIN.test(value) || UUID.test(value)) return true
  if (value.length < OPAQUE_ID_MIN_LENGTH || !DIGIT.test(value)) return false
  return ALPHANUMERIC_CODE.test(value) || NUMERIC_CODE.test(value)
}

/**
 * A metadata title that should not be used at all: absent, blank, too short
 * once source-site noise is gone, or an identifier rather than a title.
 */
export function isSuspiciousTitle(title: string | undefined): boolean {
  if (title === undefined) return true
  const value = stripNoise(title).trim()
  if (value.length < MIN_TITLE_LENGTH) return true
  return isOpaqueIdentifier(value)
}

/**
 * Drops noise, sentinels and bracketed asides. Bracketed edition markers
 * such as `(2nd Edition)` are kept in place.
 */
export function cleanTitleText(text: string): string {
  return stripNoise(text)
    .replace(SENTINEL_TOKEN, ' ')
    .replace(
      PARENTHESIZED,
      (_match: string, round?: string, square?: string) => {
        const inner = round ?? square ?? ''
        return hasEditionMarker(inner) ? ` ${inner} ` : ' '
      }
    )
    .replace(WHITESPACE_RUN, ' ')
    .replace(EDGE_JUNK, '')
}

export function inferTitleFromStem(stem: string): string {
  let value = stem
  while (BOOK_EXTENSION.test(value)) {
    value = value.replace(BOOK_EXTENSION, '')
  }
  value = cleanTitleText(value).replace(/_/g, ' ')
  value = value.replace(TRAILING_YEAR, '')
  return value.replace(WHITESPACE_RUN, ' ').replace(EDGE_JUNK, '')
}

/**
 * Cuts the subtitle off at the first `:`, ` - ` or ` -- `, carrying any
 * edition markers from the subtitle over to the kept part.
 */
export function mainTitleOnly(title: string): string {
  const value = title.trim()
  const match = SUBTITLE_SEPARATOR.exec(value)
  if (!match || match.index === 0) return value

  const head = value.slice(0, match.index).trim()
  const tail = value.slice(match.index + match[0].length)
  const headKey = compareKey(head)
  const kept = findEditionMarkers(tail).filter(
    marker => !headKey.includes(compareKey(marker))
  )
  return [head, ...kept].join(' ')
}

export function compareKey(text: string): string {
  return text
    .toLowerCase()
    .replace(/[_-]+/g, ' ')
    .replace(WHITESPACE_RUN, ' ')
    .trim()
}

/** `candidate` is `prefix` followed by at least one more word */
export function extendsTitle(candidate: string, prefix: string): boolean {
  const key = compareKey(prefix)
  if (!key) return false
  return compareKey(candidate).startsWith(`${key} `)
}

/**
 * `SRE Site Reliability Engineering` with metadata `SRE` becomes
 * `Site Reliability Engineering`: the leading acronym only repeats the words
 * after it.
 */
export function dropRedundantAcronym(
  candidate: string,
  acronym: string
): string {
  const letters = acronym.trim()
  if (!/^\p{L}{2,}$/u.test(letters)) return candidate

  const words = candidate.split(WHITESPACE_RUN).filter(Boolean)
  if (words[0]?.toLowerCase() !== letters.toLowerCase()) return candidate
  if (words.length <= letters.length) return candidate

  const initials = words
    .slice(1, letters.length + 1)
    .map(word => word[0] ?? '')
    .join('')
  return initials.toLowerCase() === letters.toLowerCase()
    ? words.slice(1).join(' ')
    : candidate
}

interface TitleContext {
  metaTitle: string | undefined
  metaMain: string
  filenameMain: string
}

interface TitleTier {
  source: TitleSource
  applies: (ctx: TitleContext) => boolean
  pick: (ctx: TitleContext) => string
}

const TITLE_TIERS: readonly TitleTier[] = [
  {
    source: 'filename',
    applies: ctx =>
      isSuspiciousTitle(ctx.metaTitle) ||
      ctx.metaMain.length < MIN_TITLE_LENGTH,
    pick: ctx => ctx.filenameMain
  },
  {
    source: 'filename',
    applies: ctx =>
      countWords(ctx.metaMain) <= SHORT_TITLE_MAX_WORDS &&
      extendsTitle(ctx.filenameMain, ctx.metaMain),
    pick: ctx => dropRedundantAcronym(ctx.filenameMain, ctx.metaMain)
  },
  {
    source: 'filename',
    applies: ctx =>
      hasEditionMarker(ctx.filenameMain) &&
      !hasEditionMarker(ctx.metaMain) &&
      extendsTitle(ctx.filenameMain, ctx.metaMain),
    pick: ctx => ctx.filenameMain
  },
  {
    source: 'metadata',
    applies: ctx => !isSuspiciousTitle(ctx.metaTitle),
    pick: ctx => ctx.metaMain
  }
]

export function chooseTitle(
  metaTitle: string | undefined,
  filenameStem: string
): TitleChoice {
  const ctx: TitleContext = {
    metaTitle,
    metaMain: mainTitleOnly(cleanTitleText(metaTitle ?? '')),
    filenameMain: mainTitleOnly(inferTitleFromStem(filenameStem))
  }

  for (const tier of TITLE_TIERS) {
    if (!tier.applies(ctx)) continue
    const title = normalizeField(tier.pick(ctx))
    if (title) return { title, source: tier.source }
  }

  return {
    title: normalizeField(filenameStem) || UNTITLED,
    source: 'filename'
  }
}

export function resolveTitle(
  metaTitle: string | undefined,
  filenameStem: string
): string {
  return chooseTitle(metaTitle, filenameStem).title
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Removes an author (and year) that a filename-derived title repeats, as in
 * `Clean_Code-Robert_Martin-2008`. Returns the title unchanged when nothing
 * would be left.
 */
export function stripAuthorFromTitle(
  title: string,
  author: string,
  year: string
): string {
  if (!title || !author || author === UNKNOWN_AUTHOR) return title

  const authorPattern = author
    .split(/[\s_]+/)
    .filter(Boolean)
    .map(escapeRegExp)
    .join('[\\s_-]+')
  if (!authorPattern) return title

  const yearPattern =
    year && year !== UNKNOWN_YEAR ? escapeRegExp(year) : '[12]\\d{3}'
  const patterns = [
    `${SEP}${START}${authorPattern}${END}(?:${SEP}${yearPattern})?\\s*$`,
    `${SEP}${START}${yearPattern}${SEP}${authorPattern}${END}\\s*$`,
    `^\\s*${authorPattern}${END}${SEP}`
  ].map(source => new RegExp(source, 'iu'))

  let cleaned = title
  for (const pattern of patterns) {
    cleaned = cleaned.replace(pattern, '').replace(EDGE_JUNK, '')
  }
  return cleaned || title
}
