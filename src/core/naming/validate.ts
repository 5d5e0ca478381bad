import { nameKey } from './collisions'
import { measureName } from './compose'
import type { Batch, RenamePlan } from './types'

export type NameProblem =
  | 'empty'
  | 'path_separator'
  | 'illegal_characters'
  | 'invalid_dot'
  | 'reserved_name'
  | 'duplicate'
  | 'exists'

export interface NameIssue {
  plan: RenamePlan
  problem: NameProblem
  message: string
}

const PATH_SEPARATOR = /[\\/]/
const ILLEGAL_CHARS = /[:*?"<>|\u0000-\u001f\u007f]/
const WINDOWS_RESERVED = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  'COM1',
  'COM2',
  'COM3',
  'COM4',
  'COM5',
  'COM6',
  'COM7',
  'COM8',
  'COM9',
  'LPT1',
  'LPT2',
  'LPT3',
  'LPT4',
  'LPT5',
  'LPT6',
  'LPT7',
  'LPT8',
  'LPT9'
])

const MESSAGES: Record<NameProblem, string> = {
  empty: 'Target name is empty',
  path_separator: 'Target name contains a path separator',
  illegal_characters:
    'Target name contains characters not allowed in file names',
  invalid_dot: 'Target name cannot be "." or ".."',
  reserved_name: 'Target name is a reserved device name on Windows',
  duplicate: 'Target name is used by another file in this batch',
  exists: 'A file with the target name already exists'
}

export function describeProblem(problem: NameProblem): string {
  return MESSAGES[problem]
}

export function validateTargetName(name: string): NameProblem | null {
  const value = name.trim()
  if (!value) return 'empty'
  if (PATH_SEPARATOR.test(value)) return 'path_separator'
  if (ILLEGAL_CHARS.test(value)) return 'illegal_characters'
  if (value === '.' || value === '..') return 'invalid_dot'
  const [device = ''] = value.split('.')
  if (WINDOWS_RESERVED.has(device.toUpperCase())) return 'reserved_name'
  return null
}

/**
 * Applies a user edit to a plan. The length figures are recomputed; call
 * {@link validateBatch} before applying the batch.
 */
export function editProposedName(plan: RenamePlan, name: string): RenamePlan {
  plan.proposedName = name.trim()
  Object.assign(plan, measureName(plan.proposedName))
  return plan
}

/**
 * Re-checks a batch after edits. Any issue blocks the apply step. Existing
 * files only count when they are not themselves being renamed.
 */
export function validateBatch(
  batch: Batch,
  existingNames: Iterable<string>
): NameIssue[] {
  const existing = new Set(Array.from(existingNames, nameKey))
  const sources = new Set(batch.map(plan => nameKey(plan.source.fileName)))
  const seen = new Set<string>()
  const issues: NameIssue[] = []

  const report = (plan: RenamePlan, problem: NameProblem) =>
    issues.push({ plan, problem, message: describeProblem(problem) })

  for (const plan of batch) {
    const problem = validateTargetName(plan.proposedName)
    if (problem) {
      report(plan, problem)
      continue
    }

    const key = nameKey(plan.proposedName)
    if (seen.has(key)) {
      report(plan, 'duplicate')
    } else if (existing.has(key) && !sources.has(key)) {
      report(plan, 'exists')
    }
    seen.add(key)
  }

  return issues
}
