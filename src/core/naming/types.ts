import type { SourceFileRef } from '@/core/book/types'

export const UNKNOWN_AUTHOR = 'UnknownAuthor'
export const UNKNOWN_YEAR = 'UnknownYear'
export const UNTITLED = 'Untitled'

export const SAFE_FILENAME_LIMIT = 200
export const WINDOWS_FILENAME_LIMIT = 255

export type WarningLevel = 'none' | 'warn200' | 'warn255'

export type ResolvedField = 'title' | 'author' | 'year'

export interface ResolvedFields {
  title: string
  author: string
  /** Four digits, or {@link UNKNOWN_YEAR} */
  year: string
}

export interface NameMeasure {
  titleLen: number
  nameLen: number
  warningLevel: WarningLevel
}

export interface RenamePlan extends NameMeasure {
  readonly source: SourceFileRef
  readonly resolved: ResolvedFields
  /** Fields that came from the filename or a sentinel instead of metadata */
  readonly fallbacks: readonly ResolvedField[]
  proposedName: string
}

export type Batch = RenamePlan[]
