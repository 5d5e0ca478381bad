import assert from 'node:assert/strict'
import test from 'node:test'

import { BookFile } from '@/core/book/book-file'
import { resolvePlan } from '@/core/naming/pipeline'
import { editProposedName } from '@/core/naming/validate'

import { formatPlanLines, planNote, planRows, planToJson } from './preview'

function samplePlan() {
  return resolvePlan(new BookFile('/books/x.pdf'), {
    title: 'Sample Book',
    authors: 'Jane Doe, John Smith',
    date: '2020'
  })
}

test('lists source, target and the resolved fields', () => {
  assert.deepEqual(formatPlanLines(samplePlan()), [
    '- x.pdf',
    '  -> Sample_Book-Jane_Doe-2020.pdf',
    '     title=Sample_Book | title_len=11 | author=Jane_Doe | year=2020' +
      ' | name_len=29'
  ])
})

test('marks unchanged names and fallback fields', () => {
  const plan = resolvePlan(
    new BookFile('/books/random_scan_042-UnknownAuthor-UnknownYear.pdf'),
    {}
  )
  const lines = formatPlanLines(plan)
  assert.equal(
    lines[1],
    '  -> random_scan_042-UnknownAuthor-UnknownYear.pdf (same)'
  )
  assert.equal(lines[3], '     fallback=title,author,year')
  assert.equal(planNote(plan), 'same, fallback: title,author,year')
})

test('shows length warnings', () => {
  const plan = editProposedName(samplePlan(), `${'a'.repeat(250)}.pdf`)
  assert.equal(plan.warningLevel, 'warn200')
  assert.equal(
    formatPlanLines(plan)[1],
    `  -> ${'a'.repeat(250)}.pdf [WARN: >200]`
  )
  assert.equal(planNote(plan), '>200')
})

test('builds table rows with truncated names', () => {
  assert.deepEqual(planRows([samplePlan()], 80), [
    ['#', 'Current', 'Proposed', 'Len', 'Note'],
    ['1', 'x.pdf', 'Sample_Book-Jane_D..', '29', '']
  ])
})

test('serializes a plan for JSON output', () => {
  assert.deepEqual(planToJson(samplePlan()), {
    source: '/books/x.pdf',
    proposedName: 'Sample_Book-Jane_Doe-2020.pdf',
    title: 'Sample_Book',
    author: 'Jane_Doe',
    year: '2020',
    titleLen: 11,
    nameLen: 29,
    warningLevel: 'none',
    fallbacks: [],
    unchanged: false
  })
})
