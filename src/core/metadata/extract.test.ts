import { mkdtemp, rm, writeFile } from 'fs/promises'
import assert from 'node:assert/strict'
import test from 'node:test'
import { tmpdir } from 'os'
import { join } from 'path'
import AdmZip from 'adm-zip'
import { PDFDocument } from 'pdf-lib'

import { BookFile } from '@/core/book/book-file'
import { resolvePlan } from '@/core/naming/pipeline'

import {
  decodeXmlText,
  extractEpubMetadata,
  extractMetadata,
  extractPdfMetadata
} from './extract'

const CONTAINER = `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`

const OPF = `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title id="t1">Tom &amp; Jerry</dc:title>
    <dc:creator id="c1">Jane Doe</dc:creator>
    <dc:creator id="c2">John Smith</dc:creator>
    <dc:date>2016-03-23</dc:date>
    <meta property="dcterms:modified">2019-03-01T00:00:00Z</meta>
  </metadata>
</package>`

const PAPER_PAGE = [
  'arXiv:2103.01234v2 [cs.LG] 2 Mar 2021',
  'Attention Is Mostly What You Need',
  'A Study of Sequence Models',
  'Jane Doe, John Smith'
].join('\n')

function buildEpub(files: Record<string, string>): Buffer {
  const zip = new AdmZip()
  zip.addFile('mimetype', Buffer.from('application/epub+zip'))
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'))
  }
  return zip.toBuffer()
}

async function buildPdf(info: {
  title?: string
  author?: string
  created?: Date
  modified?: Date
}): Promise<Buffer> {
  const doc = await PDFDocument.create({ updateMetadata: false })
  doc.addPage()
  if (info.title) doc.setTitle(info.title)
  if (info.author) doc.setAuthor(info.author)
  if (info.created) doc.setCreationDate(info.created)
  if (info.modified) doc.setModificationDate(info.modified)
  return Buffer.from(await doc.save())
}

const pageNotRead = async (): Promise<string> => {
  throw new Error('first page should not be read')
}

test('decodes entities and CDATA in XML text', () => {
  assert.equal(
    decodeXmlText('Tom &amp; Jerry &#38; &#x26; more'),
    'Tom & Jerry & & more'
  )
  assert.equal(decodeXmlText('<![CDATA[A <b> &amp; C]]>'), 'A <b> &amp; C')
})

test('reads title, creators and dates from the OPF', () => {
  const data = buildEpub({
    'META-INF/container.xml': CONTAINER,
    'OEBPS/content.opf': OPF
  })
  assert.deepEqual(extractEpubMetadata(data), {
    title: 'Tom & Jerry',
    authors: 'Jane Doe; John Smith',
    date: '2016-03-23',
    modifiedDate: '2019-03-01T00:00:00Z'
  })
})

test('fails on an EPUB without a container', () => {
  const data = buildEpub({ 'OEBPS/content.opf': OPF })
  assert.throws(() => extractEpubMetadata(data), /container\.xml not found/)
})

test('reads the PDF info dictionary without reading the page', async () => {
  const data = await buildPdf({
    title: 'Sample Book',
    author: 'Jane Doe',
    created: new Date('2020-05-01T00:00:00Z')
  })
  const record = await extractPdfMetadata(data, '/books/x.pdf', {
    readFirstPage: pageNotRead
  })
  assert.equal(record.title, 'Sample Book')
  assert.equal(record.authors, 'Jane Doe')
  assert.equal(record.date, '2020-05-01T00:00:00.000Z')
  assert.equal(record.modifiedDate, undefined)
  assert.equal(record.firstPageText, undefined)
})

test('fills missing PDF fields from the first page', async () => {
  const data = await buildPdf({ title: 'Real Title' })
  const record = await extractPdfMetadata(data, '/books/x.pdf', {
    readFirstPage: async () => PAPER_PAGE
  })
  assert.equal(record.title, 'Real Title')
  assert.equal(record.authors, 'Jane Doe, John Smith')
  assert.equal(record.date, undefined)
  assert.equal(record.firstPageText, PAPER_PAGE)
})

test('ranks the modification date above a first-page year', async () => {
  const data = await buildPdf({
    title: 'Attention Is Mostly What You Need',
    author: 'Jane Doe',
    modified: new Date('2019-06-01T00:00:00Z')
  })
  const record = await extractPdfMetadata(data, '/books/x.pdf', {
    readFirstPage: async () => PAPER_PAGE
  })
  assert.equal(record.date, undefined)
  assert.equal(record.modifiedDate, '2019-06-01T00:00:00.000Z')

  const plan = resolvePlan(new BookFile('/books/x.pdf'), record)
  assert.equal(plan.resolved.year, '2019')
  assert.deepEqual(plan.fallbacks, [])
})

test('keeps the info dictionary when the page has no text', async () => {
  const data = await buildPdf({})
  const record = await extractPdfMetadata(data, '/books/x.pdf', {
    readFirstPage: async () => '  '
  })
  assert.equal(record.title, undefined)
  assert.equal(record.authors, undefined)
  assert.equal(record.firstPageText, '  ')
})

test('dispatches on the file format', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'ebook-renamer-'))
  try {
    const epubPath = join(dir, 'book.epub')
    await writeFile(
      epubPath,
      buildEpub({
        'META-INF/container.xml': CONTAINER,
        'OEBPS/content.opf': OPF
      })
    )
    const pdfPath = join(dir, 'paper.PDF')
    await writeFile(pdfPath, await buildPdf({}))

    const epub = await extractMetadata(new BookFile(epubPath))
    assert.equal(epub.title, 'Tom & Jerry')

    const pdf = await extractMetadata(new BookFile(pdfPath), {
      readFirstPage: async () => PAPER_PAGE
    })
    assert.equal(
      pdf.title,
      'Attention Is Mostly What You Need: A Study of Sequence Models'
    )
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
})
