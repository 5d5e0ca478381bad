import assert from 'node:assert/strict'
import test from 'node:test'

import {
  codePointLength,
  compose,
  measureName,
  splitExtension,
  warningLevelFor
} from './compose'

test('builds Title-Author-Year with a lower-case extension', () => {
  assert.deepEqual(compose('The Art of War', 'Sun Tzu', '2005', '.EPUB'), {
    name: 'The_Art_of_War-Sun_Tzu-2005.epub',
    titleLen: 14,
    nameLen: 32,
    warningLevel: 'none'
  })
})

test('fills empty fields with sentinels', () => {
  assert.equal(
    compose('', '', '', 'pdf').name,
    'Untitled-UnknownAuthor-UnknownYear.pdf'
  )
})

test('warns above 200 and above 255 characters', () => {
  assert.equal(warningLevelFor(200), 'none')
  assert.equal(warningLevelFor(201), 'warn200')
  assert.equal(warningLevelFor(255), 'warn200')
  assert.equal(warningLevelFor(256), 'warn255')
  assert.equal(
    compose('a'.repeat(250), 'B', '2000', 'pdf').warningLevel,
    'warn255'
  )
})

test('counts characters rather than code units', () => {
  assert.equal(codePointLength('日本語'), 3)
  assert.equal(codePointLength('😀'), 1)
})

test('measures a name typed by hand', () => {
  assert.deepEqual(measureName('My_Title-Author-2020.pdf'), {
    titleLen: 8,
    nameLen: 24,
    warningLevel: 'none'
  })
})

test('treats a leading dot as part of the stem', () => {
  assert.deepEqual(splitExtension('.hidden'), { stem: '.hidden', ext: '' })
  assert.deepEqual(splitExtension('a.b.pdf'), { stem: 'a.b', ext: '.pdf' })
})
