import { codePointLength, splitExtension, warningLevelFor } from './compose'
import type { Batch } from './types'

/** Names are compared the way case-insensitive file systems do */
export function nameKey(name: string): string {
  return name.normalize('NFC').toLowerCase()
}

export function withSuffix(name: string, n: number): string {
  const { stem, ext } = splitExtension(name)
  return `${stem}-${n}${ext}`
}

/**
 * Makes every proposed name unique within the batch and against the files
 * already in the directory, appending `-2`, `-3`, ... in batch order. A plan
 * may keep its own current file name unless an earlier plan took it.
 * Mutates the plans and returns the same batch.
 */
export function resolveCollisions(
  batch: Batch,
  existingNames: Iterable<string>
): Batch {
  const existing = new Set(Array.from(existingNames, nameKey))
  const claimed = new Set<string>()

  for (const plan of batch) {
    const own = nameKey(plan.source.fileName)
    const isTaken = (key: string) =>
      claimed.has(key) || (key !== own && existing.has(key))

    let candidate = plan.proposedName
    for (let n = 2; isTaken(nameKey(candidate)); n++) {
      candidate = withSuffix(plan.proposedName, n)
    }

    if (candidate !== plan.proposedName) {
      plan.proposedName = candidate
      plan.nameLen = codePointLength(candidate)
      plan.warningLevel = warningLevelFor(plan.nameLen)
    }
    claimed.add(nameKey(candidate))
  }

  return batch
}
