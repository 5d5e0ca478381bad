/**
 * Metadata as read from the container. Every field is untrusted free text.
 * A field is `undefined` when the source has no such entry; a present but
 * blank entry is kept as the empty string.
 */
export interface MetadataRecord {
  title?: string
  /** Raw author field, possibly several names joined by `,`, `;` or `and` */
  authors?: string
  date?: string
  /** EPUB `dcterms:modified` or PDF ModDate */
  modifiedDate?: string
  /** Text of the first PDF page, when it was probed */
  firstPageText?: string
}
