import { basename, extname, resolve } from 'path'

import { BookFormat, type SourceFileRef } from './types'

export function bookFormatFromPath(path: string): BookFormat | null {
  const ext = extname(path).slice(1).toLowerCase()
  if (ext === BookFormat.EPUB) return BookFormat.EPUB
  if (ext === BookFormat.PDF) return BookFormat.PDF
  return null
}

export function isBookFile(path: string): boolean {
  return bookFormatFromPath(path) !== null
}

export class BookFile implements SourceFileRef {
  public readonly path: string
  public readonly fileName: string
  public readonly stem: string
  public readonly format: BookFormat

  constructor(path: string) {
    const format = bookFormatFromPath(path)
    if (!format) {
      throw new Error(`not a book file: ${path}`)
    }
    this.path = resolve(path)
    this.fileName = basename(this.path)
    this.stem = this.fileName.slice(0, -extname(this.fileName).length)
    this.format = format
    Object.freeze(this)
  }
}
