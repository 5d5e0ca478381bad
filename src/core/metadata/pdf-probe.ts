import { execFile } from 'child_process'
import { promisify } from 'util'

import type { MetadataRecord } from './types'

const execFileAsync = promisify(execFile)

/** How far down the first page a title is looked for */
const TITLE_SCAN_LINES = 60
const AUTHOR_SCAN_LINES = 18
const SKIPPED_HEADINGS = ['arxiv:', 'contents', 'preface', 'abstract']

type ProbeCommand = (path: string) => [string, string[]]

const PROBE_COMMANDS: readonly ProbeCommand[] = [
  path => ['pdftotext', ['-f', '1', '-l', '1', path, '-']],
  path => ['mutool', ['draw', '-F', 'txt', '-i', path, '1']]
]

function isExecFailure(error: unknown): boolean {
  return error instanceof Error && 'code' in error
}

/**
 * Text of the first page, via `pdftotext` or `mutool`. Both tools are
 * optional: when neither is installed or both fail the result is empty.
 */
export async function readFirstPageText(path: string): Promise<string> {
  for (const command of PROBE_COMMANDS) {
    const [file, args] = command(path)
    try {
      const { stdout } = await execFileAsync(file, args, {
        maxBuffer: 16 * 1024 * 1024
      })
      if (stdout.trim()) return stdout
    } catch (error) {
      if (!isExecFailure(error)) throw error
    }
  }
  return ''
}

export function isLikelyAuthorLine(line: string): boolean {
  const lowered = line.toLowerCase()
  if (line.includes('@')) return false
  if (
    lowered.includes('based on research') ||
    lowered.includes('collaboration')
  ) {
    return false
  }

  const words = line.match(/[A-Za-z][A-Za-z.'-]*/g) ?? []
  if (words.length < 2 || words.length > 12) return false
  const capitalized = words.filter(word => /^[A-Z]/.test(word)).length
  if (capitalized < 2) return false
  return line.includes(',') || lowered.includes(' and ') || words.length <= 4
}

function startsWithHeading(lowered: string, extra: string[] = []): boolean {
  return [...SKIPPED_HEADINGS, ...extra].some(heading =>
    lowered.startsWith(heading)
  )
}

function isTitleLine(line: string): boolean {
  const lowered = line.toLowerCase()
  if (startsWithHeading(lowered)) return false
  if (line.includes('@')) return false
  if (/^[ivxlcdm]+$/.test(lowered)) return false
  const words = line.split(' ')
  if (words.length < 3 || words.length > 24) return false
  if (line.length < 12) return false
  return !isLikelyAuthorLine(line)
}

function isSubtitleLine(line: string): boolean {
  return (
    line.split(' ').length >= 3 &&
    line.length <= 140 &&
    !isLikelyAuthorLine(line) &&
    !startsWithHeading(line.toLowerCase(), ['based on '])
  )
}

/**
 * Guesses title and author from the text of a first page. Only fields it
 * finds are set; the year is left to the naming rules, which rank the
 * page below the modification date.
 */
export function parseFirstPageText(
  text: string
): Pick<MetadataRecord, 'title' | 'authors'> {
  const lines = text
    .split(/\r?\n/)
    .map(raw => raw.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
  if (!lines.length) return {}

  let title: string | undefined
  const titleIdx = lines
    .slice(0, TITLE_SCAN_LINES)
    .findIndex(line => isTitleLine(line))
  if (titleIdx !== -1) {
    title = lines[titleIdx]
    const next = lines[titleIdx + 1]
    if (next !== undefined && isSubtitleLine(next)) {
      const joiner = /[.:\-?!]$/.test(title) ? ' ' : ': '
      title = `${title}${joiner}${next}`
    }
  }

  const start = titleIdx === -1 ? 0 : titleIdx + 1
  const authors = lines
    .slice(start, start + AUTHOR_SCAN_LINES)
    .find(line => isLikelyAuthorLine(line))

  const result: Pick<MetadataRecord, 'title' | 'authors'> = {}
  if (title) result.title = title
  if (authors) result.authors = authors
  return result
}
