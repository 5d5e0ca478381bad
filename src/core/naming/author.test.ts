import assert from 'node:assert/strict'
import test from 'node:test'

import {
  authorFromParentheses,
  authorFromTrailingSegment,
  chooseAuthor,
  firstAuthor
} from './author'

test('takes the first of several authors', () => {
  assert.equal(firstAuthor('Jane Doe, John Smith'), 'Jane Doe')
  assert.equal(firstAuthor('Jane Doe and John Smith'), 'Jane Doe')
  assert.equal(firstAuthor('Jane Doe; John Smith'), 'Jane Doe')
  assert.equal(firstAuthor('Andrew Ng'), 'Andrew Ng')
})

test('drops honorifics', () => {
  assert.equal(firstAuthor('Jane Doe PhD'), 'Jane Doe')
})

test('reads an author from parentheses in the filename', () => {
  assert.equal(authorFromParentheses('Dune (Frank Herbert)'), 'Frank Herbert')
  assert.equal(
    authorFromParentheses('Book (2nd Edition) (Jane Roe, Ed)'),
    'Jane Roe'
  )
  assert.equal(authorFromParentheses('Book (z-library)'), null)
  assert.equal(authorFromParentheses('Book (2019)'), null)
})

test('reads an author back out of a generated name', () => {
  assert.equal(
    authorFromTrailingSegment('Clean_Code-Robert_Martin-2008'),
    'Robert Martin'
  )
  assert.equal(
    authorFromTrailingSegment('Clean_Code-UnknownAuthor-UnknownYear'),
    null
  )
  assert.equal(authorFromTrailingSegment('Dune'), null)
  assert.equal(authorFromTrailingSegment('Title-bob'), null)
  assert.equal(authorFromTrailingSegment('Title-Ng'), null)
})

test('prefers the metadata author', () => {
  assert.deepEqual(chooseAuthor('Jane Doe, John Smith', 'x'), {
    author: 'Jane_Doe',
    source: 'metadata'
  })
})

test('falls back to the filename, then to the sentinel', () => {
  assert.deepEqual(chooseAuthor(undefined, 'Dune (Frank Herbert)'), {
    author: 'Frank_Herbert',
    source: 'filename'
  })
  assert.deepEqual(chooseAuthor('', 'random_scan_042'), {
    author: 'UnknownAuthor',
    source: 'sentinel'
  })
  assert.deepEqual(chooseAuthor('z-library', 'x'), {
    author: 'UnknownAuthor',
    source: 'sentinel'
  })
})
