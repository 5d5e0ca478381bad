export const NOISE_PATTERNS: readonly RegExp[] = [
  /z-library/gi,
  /z-lib\.org/gi,
  /z-lib/gi,
  /1lib/gi,
  /lib\.sk/gi
]

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g
const UNSAFE_CHARS = /[\\/:*?"<>|]/g
const RESERVED_PUNCTUATION = /[.,;()[\]{}]/g
const WHITESPACE_RUN = /\s+/g
const UNDERSCORE_RUN = /_+/g
const EDGE_JUNK = /^[\s_.-]+|[\s_.-]+$/g

export function stripNoise(value: string): string {
  return NOISE_PATTERNS.reduce(
    (acc, pattern) => acc.replace(pattern, ''),
    value
  )
}

export function isNoise(value: string): boolean {
  return NOISE_PATTERNS.some(pattern => {
    pattern.lastIndex = 0
    return pattern.test(value)
  })
}

/**
 * Turns free text into a filename-safe token: `The Art of War` becomes
 * `The_Art_of_War`. Never fails; an empty input gives an empty output.
 */
export function normalizeField(raw: string): string {
  return stripNoise(raw)
    .replace(CONTROL_CHARS, ' ')
    .replace(UNSAFE_CHARS, ' ')
    .replace(RESERVED_PUNCTUATION, ' ')
    .replace(WHITESPACE_RUN, '_')
    .replace(UNDERSCORE_RUN, '_')
    .replace(EDGE_JUNK, '')
}
