import { normalizeField } from './normalize'
import {
  SAFE_FILENAME_LIMIT,
  UNKNOWN_AUTHOR,
  UNKNOWN_YEAR,
  UNTITLED,
  WINDOWS_FILENAME_LIMIT,
  type NameMeasure,
  type WarningLevel
} from './types'

export interface ComposedName extends NameMeasure {
  name: string
}

/** Length in characters rather than UTF-16 code units */
export function codePointLength(text: string): number {
  return Array.from(text).length
}

export function warningLevelFor(nameLen: number): WarningLevel {
  if (nameLen > WINDOWS_FILENAME_LIMIT) return 'warn255'
  if (nameLen > SAFE_FILENAME_LIMIT) return 'warn200'
  return 'none'
}

export function splitExtension(name: string): { stem: string; ext: string } {
  const lastDot = name.lastIndexOf('.')
  if (lastDot <= 0) return { stem: name, ext: '' }
  return { stem: name.substring(0, lastDot), ext: name.substring(lastDot) }
}

export function compose(
  title: string,
  author: string,
  year: string,
  extension: string
): ComposedName {
  const safeTitle = normalizeField(title) || UNTITLED
  const safeAuthor = normalizeField(author) || UNKNOWN_AUTHOR
  const safeYear = normalizeField(year) || UNKNOWN_YEAR
  const ext = extension.replace(/^\.+/, '').toLowerCase()

  const name = `${safeTitle}-${safeAuthor}-${safeYear}.${ext}`
  const nameLen = codePointLength(name)
  return {
    name,
    titleLen: codePointLength(safeTitle),
    nameLen,
    warningLevel: warningLevelFor(nameLen)
  }
}

/**
 * Length figures for a name that did not come out of {@link compose}, e.g.
 * one the user typed. The title is taken to run up to the first `-`.
 */
export function measureName(name: string): NameMeasure {
  const { stem } = splitExtension(name)
  const dash = stem.indexOf('-')
  const title = dash === -1 ? stem : stem.substring(0, dash)
  const nameLen = codePointLength(name)
  return {
    titleLen: codePointLength(title),
    nameLen,
    warningLevel: warningLevelFor(nameLen)
  }
}
