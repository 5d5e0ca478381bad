import { readdir } from 'fs/promises'
import { join } from 'path'

import { BookFile, isBookFile } from './book-file'

/**
 * Book files directly inside `dir`, sorted by name. This order is the
 * discovery order that collision suffixes are assigned in.
 */
export async function collectBookFiles(dir: string): Promise<BookFile[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  return entries
    .filter(entry => entry.isFile() && isBookFile(entry.name))
    .map(entry => entry.name)
    .sort(compareNames)
    .map(name => new BookFile(join(dir, name)))
}

export async function listExistingNames(dir: string): Promise<Set<string>> {
  const entries = await readdir(dir)
  return new Set(entries)
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
