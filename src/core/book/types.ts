export enum BookFormat {
  EPUB = 'epub',
  PDF = 'pdf'
}

/**
 * A book file found on disk. Immutable once created.
 */
export interface SourceFileRef {
  readonly path: string
  /** Base name including the extension */
  readonly fileName: string
  /** Base name without the extension */
  readonly stem: string
  readonly format: BookFormat
}
