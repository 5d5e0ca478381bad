import type { SourceFileRef } from '@/core/book/types'
import type { MetadataRecord } from '@/core/metadata/types'

import { abbreviate } from './abbreviate'
import { chooseAuthor } from './author'
import { resolveCollisions } from './collisions'
import { compose } from './compose'
import { chooseTitle, stripAuthorFromTitle } from './title'
import type { Batch, RenamePlan, ResolvedField } from './types'
import { chooseYear } from './year'

export interface PlanInput {
  source: SourceFileRef
  metadata: MetadataRecord
}

/**
 * Resolves one file. Pure and independent of every other file in the batch;
 * always returns a plan.
 */
export function resolvePlan(
  source: SourceFileRef,
  metadata: MetadataRecord
): RenamePlan {
  const titleChoice = chooseTitle(metadata.title, source.stem)
  const authorChoice = chooseAuthor(metadata.authors, source.stem)
  const yearChoice = chooseYear({
    date: metadata.date,
    modifiedDate: metadata.modifiedDate,
    filenameStem: source.stem,
    firstPageText: metadata.firstPageText
  })

  const title = abbreviate(
    titleChoice.source === 'filename'
      ? stripAuthorFromTitle(
          titleChoice.title,
          authorChoice.author,
          yearChoice.year
        )
      : titleChoice.title
  )
  const composed = compose(
    title,
    authorChoice.author,
    yearChoice.year,
    source.format
  )

  const fallbacks: ResolvedField[] = []
  if (titleChoice.source !== 'metadata') fallbacks.push('title')
  if (authorChoice.source !== 'metadata') fallbacks.push('author')
  if (yearChoice.source === 'filename' || yearChoice.source === 'sentinel') {
    fallbacks.push('year')
  }

  return {
    source,
    resolved: {
      title,
      author: authorChoice.author,
      year: yearChoice.year
    },
    fallbacks,
    proposedName: composed.name,
    titleLen: composed.titleLen,
    nameLen: composed.nameLen,
    warningLevel: composed.warningLevel
  }
}

/**
 * Resolves every file, then makes the names unique in discovery order.
 */
export function resolveBatch(
  inputs: readonly PlanInput[],
  existingNames: Iterable<string>
): Batch {
  const batch = inputs.map(({ source, metadata }) =>
    resolvePlan(source, metadata)
  )
  return resolveCollisions(batch, existingNames)
}
