import type { RenamePlan, WarningLevel } from '@/core/naming/types'

import { truncateText } from './text'

const WARNING_NOTES: Record<WarningLevel, string> = {
  none: '',
  warn200: '>200',
  warn255: '>255'
}

export function isUnchanged(plan: RenamePlan): boolean {
  return plan.proposedName === plan.source.fileName
}

export function formatPlanLines(plan: RenamePlan): string[] {
  const same = isUnchanged(plan) ? ' (same)' : ''
  const warning = WARNING_NOTES[plan.warningLevel]
  const lines = [
    `- ${plan.source.fileName}`,
    `  -> ${plan.proposedName}${same}${warning ? ` [WARN: ${warning}]` : ''}`,
    `     title=${plan.resolved.title} | title_len=${plan.titleLen} | ` +
      `author=${plan.resolved.author} | year=${plan.resolved.year} | ` +
      `name_len=${plan.nameLen}`
  ]
  if (plan.fallbacks.length) {
    lines.push(`     fallback=${plan.fallbacks.join(',')}`)
  }
  return lines
}

export function planNote(plan: RenamePlan): string {
  const notes = [WARNING_NOTES[plan.warningLevel]]
  if (isUnchanged(plan)) notes.push('same')
  if (plan.fallbacks.length) notes.push(`fallback: ${plan.fallbacks.join(',')}`)
  return notes.filter(Boolean).join(', ')
}

/** Rows for `table`, names truncated so both columns fit `width` */
export function planRows(
  plans: readonly RenamePlan[],
  width: number
): string[][] {
  const nameWidth = Math.max(12, Math.floor((width - 40) / 2))
  return [
    ['#', 'Current', 'Proposed', 'Len', 'Note'],
    ...plans.map((plan, idx) => [
      String(idx + 1),
      truncateText(plan.source.fileName, nameWidth),
      truncateText(plan.proposedName, nameWidth),
      String(plan.nameLen),
      planNote(plan)
    ])
  ]
}

export function planToJson(plan: RenamePlan) {
  return {
    source: plan.source.path,
    proposedName: plan.proposedName,
    title: plan.resolved.title,
    author: plan.resolved.author,
    year: plan.resolved.year,
    titleLen: plan.titleLen,
    nameLen: plan.nameLen,
    warningLevel: plan.warningLevel,
    fallbacks: plan.fallbacks,
    unchanged: isUnchanged(plan)
  }
}
