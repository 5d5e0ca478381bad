import assert from 'node:assert/strict'
import test from 'node:test'

import {
  chooseTitle,
  cleanTitleText,
  dropRedundantAcronym,
  inferTitleFromStem,
  isSuspiciousTitle,
  mainTitleOnly,
  stripAuthorFromTitle
} from './title'

test('flags missing, short and identifier-like titles', () => {
  assert.equal(isSuspiciousTitle(undefined), true)
  assert.equal(isSuspiciousTitle(''), true)
  assert.equal(isSuspiciousTitle('ab'), true)
  assert.equal(isSuspiciousTitle('z-lib'), true)
  assert.equal(isSuspiciousTitle('B00ABCDEFG'), true)
  assert.equal(isSuspiciousTitle('9781234567897'), true)
})

test('accepts ordinary titles, including ones with digits', () => {
  assert.equal(isSuspiciousTitle('Dune'), false)
  assert.equal(isSuspiciousTitle('Catch 22'), false)
  assert.equal(isSuspiciousTitle('1984'), false)
})

test('drops bracketed asides but keeps bracketed editions', () => {
  assert.equal(cleanTitleText('Dune (Penguin Classics)'), 'Dune')
  assert.equal(cleanTitleText('Dune (2nd Edition)'), 'Dune 2nd Edition')
})

test('infers a title from a stem without its trailing year', () => {
  assert.equal(
    inferTitleFromStem('Clean_Code-Robert_Martin-2008'),
    'Clean Code-Robert Martin'
  )
  assert.equal(inferTitleFromStem('1984'), '1984')
})

test('cuts the subtitle but carries the edition over', () => {
  assert.equal(
    mainTitleOnly('Database Systems: The Complete Book, 3rd Edition'),
    'Database Systems 3rd Edition'
  )
  assert.equal(mainTitleOnly('Dune'), 'Dune')
})

test('drops a leading acronym spelled out by the following words', () => {
  assert.equal(
    dropRedundantAcronym('SRE Site Reliability Engineering', 'SRE'),
    'Site Reliability Engineering'
  )
  assert.equal(
    dropRedundantAcronym('SRE Something Else', 'SRE'),
    'SRE Something Else'
  )
})

test('prefers the filename when metadata holds only a prefix of it', () => {
  assert.deepEqual(chooseTitle('SRE', 'SRE Site Reliability Engineering'), {
    title: 'Site_Reliability_Engineering',
    source: 'filename'
  })
})

test('uses the metadata title, cut at the subtitle', () => {
  assert.deepEqual(
    chooseTitle('Database Systems: 3rd Edition', 'whatever'),
    { title: 'Database_Systems_3rd_Edition', source: 'metadata' }
  )
})

test('falls back to the filename when metadata has no title', () => {
  assert.deepEqual(chooseTitle(undefined, 'random_scan_042'), {
    title: 'random_scan_042',
    source: 'filename'
  })
  assert.deepEqual(chooseTitle('', ''), {
    title: 'Untitled',
    source: 'filename'
  })
})

test('never uses an identifier title, even with no filename title', () => {
  assert.deepEqual(chooseTitle('B01ABCDEFG', '(Jane Doe)'), {
    title: 'Jane_Doe',
    source: 'filename'
  })
})

test('removes an author and year repeated in the title', () => {
  assert.equal(
    stripAuthorFromTitle('Clean_Code-Robert_Martin', 'Robert_Martin', '2008'),
    'Clean_Code'
  )
  assert.equal(
    stripAuthorFromTitle('Dune', 'UnknownAuthor', 'UnknownYear'),
    'Dune'
  )
})

test('keeps a title that consists of the author name only', () => {
  assert.equal(
    stripAuthorFromTitle('Frank_Herbert', 'Frank_Herbert', '1965'),
    'Frank_Herbert'
  )
})
