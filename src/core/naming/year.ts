import { UNKNOWN_YEAR } from './types'

export const MIN_YEAR = 1000
export const MAX_YEAR = 2999
/** Only the top of a first page is searched for a date line */
export const FIRST_PAGE_SCAN_LINES = 20

export type YearSource = 'metadata' | 'content' | 'filename' | 'sentinel'

export interface YearChoice {
  year: string
  source: YearSource
}

export interface YearInput {
  date?: string
  modifiedDate?: string
  filenameStem: string
  firstPageText?: string
}

const FOUR_DIGIT_RUN = /(?<!\d)\d{4}(?!\d)/g
const YEAR_TOKEN = /^[12]\d{3}$/
const ARXIV_LINE = /^arxiv:/i
const ARXIV_NEW_ID = /arxiv:\s*(\d{2})(\d{2})\.\d{4,5}/i
const ARXIV_OLD_ID = /arxiv:\s*[a-z-]+(?:\.[a-z]{2})?\/(\d{2})(\d{2})\d{3}/i
const COPYRIGHT_LINE = /(?:©|\(c\)|copyright)/i

function inRange(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR
}

/** First run of exactly four digits that falls in the accepted range */
export function extractYear(text: string | undefined): string | null {
  if (!text) return null
  for (const match of text.matchAll(FOUR_DIGIT_RUN)) {
    if (inRange(Number(match[0]))) return match[0]
  }
  return null
}

function yearFromArxivLine(line: string): string | null {
  const token = line
    .split(/\s+/)
    .map(part => part.replace(/^[([]+|[)\],.;]+$/g, ''))
    .find(part => YEAR_TOKEN.test(part) && inRange(Number(part)))
  if (token) return token

  const id = line.match(ARXIV_NEW_ID) ?? line.match(ARXIV_OLD_ID)
  if (!id) return null
  const [, yy, mm] = id
  const month = Number(mm)
  if (month < 1 || month > 12) return null
  const century = Number(yy) >= 91 ? '19' : '20'
  return `${century}${yy}`
}

export function yearFromFirstPageText(text: string | undefined): string | null {
  if (!text) return null
  const lines = text
    .split(/\r?\n/)
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .slice(0, FIRST_PAGE_SCAN_LINES)

  for (const line of lines) {
    if (!ARXIV_LINE.test(line)) continue
    const year = yearFromArxivLine(line)
    if (year) return year
  }
  for (const line of lines) {
    if (!COPYRIGHT_LINE.test(line)) continue
    const year = extractYear(line)
    if (year) return year
  }
  return null
}

interface YearTier {
  source: YearSource
  pick: (input: YearInput) => string | null
}

const YEAR_TIERS: readonly YearTier[] = [
  { source: 'metadata', pick: input => extractYear(input.date) },
  { source: 'metadata', pick: input => extractYear(input.modifiedDate) },
  {
    source: 'content',
    pick: input => yearFromFirstPageText(input.firstPageText)
  },
  { source: 'filename', pick: input => extractYear(input.filenameStem) }
]

export function chooseYear(input: YearInput): YearChoice {
  for (const tier of YEAR_TIERS) {
    const year = tier.pick(input)
    if (year) return { year, source: tier.source }
  }
  return { year: UNKNOWN_YEAR, source: 'sentinel' }
}

export function resolveYear(
  date: string | undefined,
  modifiedDate: string | undefined,
  filenameStem: string,
  firstPageText?: string
): string {
  return chooseYear({ date, modifiedDate, filenameStem, firstPageText }).year
}
