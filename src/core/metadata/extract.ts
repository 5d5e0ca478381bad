import { readFile } from 'fs/promises'
import AdmZip from 'adm-zip'
import { PDFDocument } from 'pdf-lib'

import { BookFormat, type SourceFileRef } from '@/core/book/types'

import { parseFirstPageText, readFirstPageText } from './pdf-probe'
import type { MetadataRecord } from './types'

export interface ExtractOptions {
  /** Reads the text of the first PDF page; defaults to the external tools */
  readFirstPage?: (path: string) => Promise<string>
}

export async function extractMetadata(
  file: SourceFileRef,
  options: ExtractOptions = {}
): Promise<MetadataRecord> {
  const data = await readFile(file.path)
  if (file.format === BookFormat.EPUB) {
    return extractEpubMetadata(data)
  }
  return extractPdfMetadata(data, file.path, options)
}

/** Attribute value from an XML tag, regardless of attribute order */
function attr(tag: string, name: string): string | null {
  const m = tag.match(new RegExp(`${name}=["']([^"']+)["']`))
  return m?.[1] ?? null
}

/** ZIP lookup that tolerates a leading slash and case differences */
function findEntry(zip: AdmZip, rawPath: string): AdmZip.IZipEntry | null {
  const path = rawPath.replace(/^\//, '')
  const exact = zip.getEntry(path)
  if (exact) return exact
  const lower = path.toLowerCase()
  for (const e of zip.getEntries()) {
    if (e.entryName.toLowerCase() === lower) return e
  }
  return null
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' '
}

const CDATA_SECTION = /(<!\[CDATA\[[\s\S]*?\]\]>)/
const CDATA_CONTENT = /^<!\[CDATA\[([\s\S]*?)\]\]>$/

function decodeEntities(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/&#x([0-9a-f]+);/gi, (_m, hex: string) =>
      String.fromCodePoint(parseInt(hex, 16))
    )
    .replace(/&#(\d+);/g, (_m, dec: string) =>
      String.fromCodePoint(parseInt(dec, 10))
    )
    .replace(/&([a-z]+);/gi, (m, name: string) => NAMED_ENTITIES[name] ?? m)
}

/** Element text with markup dropped; CDATA sections are taken verbatim */
export function decodeXmlText(raw: string): string {
  return raw
    .split(CDATA_SECTION)
    .map(part => {
      const cdata = CDATA_CONTENT.exec(part)
      return cdata ? cdata[1] : decodeEntities(part)
    })
    .join('')
    .trim()
}

function elementTexts(xml: string, tag: string): string[] {
  const pattern = new RegExp(
    `<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`,
    'gi'
  )
  return Array.from(xml.matchAll(pattern), m => decodeXmlText(m[1]))
}

function readOpf(zip: AdmZip): string {
  const containerEntry = findEntry(zip, 'META-INF/container.xml')
  if (!containerEntry) throw new Error('META-INF/container.xml not found')

  const containerXml = containerEntry.getData().toString('utf-8')
  const rootfile = containerXml.match(/<rootfile\s[^>]*>/i)
  const opfPath = rootfile ? attr(rootfile[0], 'full-path') : null
  if (!opfPath) throw new Error('Cannot locate OPF in container.xml')

  const opfEntry = findEntry(zip, opfPath)
  if (!opfEntry) throw new Error(`OPF not found: ${opfPath}`)
  return opfEntry.getData().toString('utf-8')
}

export function extractEpubMetadata(data: Buffer): MetadataRecord {
  const opfXml = readOpf(new AdmZip(data))

  const [title] = [
    ...elementTexts(opfXml, 'dc:title'),
    ...elementTexts(opfXml, 'title')
  ]
  const creators = elementTexts(opfXml, 'dc:creator').filter(Boolean)
  const [date] = elementTexts(opfXml, 'dc:date')

  let modifiedDate: string | undefined
  for (const m of opfXml.matchAll(/<meta\s[^>]*>([\s\S]*?)<\/meta>/gi)) {
    if (attr(m[0], 'property') === 'dcterms:modified') {
      modifiedDate = decodeXmlText(m[1])
      break
    }
  }

  return {
    title,
    authors: creators.length ? creators.join('; ') : undefined,
    date,
    modifiedDate
  }
}

function isoDate(date: Date | undefined): string | undefined {
  if (!date || Number.isNaN(date.getTime())) return undefined
  return date.toISOString()
}

/**
 * Reads the info dictionary. When title, author or creation date is
 * missing, the first page is read: it fills a missing title or author, and
 * its text is kept for the year rules.
 */
export async function extractPdfMetadata(
  data: Buffer,
  path: string,
  options: ExtractOptions = {}
): Promise<MetadataRecord> {
  const pdfDoc = await PDFDocument.load(data, {
    updateMetadata: false,
    ignoreEncryption: true
  })
  const record: MetadataRecord = {
    title: pdfDoc.getTitle()?.trim(),
    authors: pdfDoc.getAuthor()?.trim(),
    date: isoDate(pdfDoc.getCreationDate()),
    modifiedDate: isoDate(pdfDoc.getModificationDate())
  }
  if (record.title && record.authors && record.date) return record

  const readFirstPage = options.readFirstPage ?? readFirstPageText
  const text = await readFirstPage(path)
  if (!text.trim()) return { ...record, firstPageText: text }

  const fromPage = parseFirstPageText(text)
  return {
    ...record,
    title: record.title || fromPage.title,
    authors: record.authors || fromPage.authors,
    firstPageText: text
  }
}
