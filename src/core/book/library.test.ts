import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import assert from 'node:assert/strict'
import test from 'node:test'
import { tmpdir } from 'os'
import { join } from 'path'

import { BookFile } from './book-file'
import { collectBookFiles, listExistingNames } from './library'
import { BookFormat } from './types'

async function withLibrary(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'ebook-renamer-'))
  try {
    await writeFile(join(dir, 'b.pdf'), 'pdf')
    await writeFile(join(dir, 'A.EPUB'), 'epub')
    await writeFile(join(dir, 'notes.txt'), 'text')
    await mkdir(join(dir, 'c.pdf'))
    await run(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}

test('collects only book files, sorted by name', async () => {
  await withLibrary(async dir => {
    const files = await collectBookFiles(dir)
    assert.deepEqual(
      files.map(file => [file.fileName, file.format]),
      [
        ['A.EPUB', BookFormat.EPUB],
        ['b.pdf', BookFormat.PDF]
      ]
    )
  })
})

test('lists every entry name in the directory', async () => {
  await withLibrary(async dir => {
    const names = await listExistingNames(dir)
    assert.deepEqual(
      [...names].sort(),
      ['A.EPUB', 'b.pdf', 'c.pdf', 'notes.txt']
    )
  })
})

test('splits a book path into name, stem and format', () => {
  const file = new BookFile('/books/My.Book.EPUB')
  assert.equal(file.path, '/books/My.Book.EPUB')
  assert.equal(file.fileName, 'My.Book.EPUB')
  assert.equal(file.stem, 'My.Book')
  assert.equal(file.format, BookFormat.EPUB)
})

test('refuses files that are not books', () => {
  assert.throws(() => new BookFile('/books/readme.txt'), /not a book file/)
})
