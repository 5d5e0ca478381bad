// `_` counts as a word separator here, so `\b` is not usable: normalized
// titles join their words with underscores.
const START = '(?<![\\p{L}\\p{N}])'
const END = '(?![\\p{L}\\p{N}])'
const GAP = '[\\s_]+'

type Replacer = (match: string, ...groups: string[]) => string

export interface AbbreviationRule {
  readonly pattern: RegExp
  readonly replace: Replacer
  /** Rewrites an edition name; these are kept when a subtitle is cut off */
  readonly edition: boolean
}

function rule(
  source: string,
  replace: string | Replacer,
  edition = false
): AbbreviationRule {
  return Object.freeze({
    pattern: new RegExp(`${START}${source}${END}`, 'giu'),
    replace: typeof replace === 'string' ? () => replace : replace,
    edition
  })
}

const WORD_ORDINALS = [
  'first',
  'second',
  'third',
  'fourth',
  'fifth',
  'sixth',
  'seventh',
  'eighth',
  'ninth',
  'tenth'
] as const

/**
 * Applied top to bottom. Specific edition names come before the generic
 * `Edition -> Ed`, which therefore only sees editions nothing else took.
 */
export const ABBREVIATION_RULES: readonly AbbreviationRule[] = Object.freeze([
  rule('Edtion', 'Edition'),
  rule(
    `(\\d+)[\\s_]*(?:st|nd|rd|th)${GAP}Edition`,
    (_match, n) => `${n}e`,
    true
  ),
  ...WORD_ORDINALS.map((word, index) =>
    rule(`${word}${GAP}Edition`, `${index + 1}e`, true)
  ),
  rule(`Revised${GAP}Edition`, 'RevEd', true),
  rule(`Updated${GAP}Edition`, 'UpdEd', true),
  rule(`International${GAP}Edition`, 'IntlEd', true),
  rule(`Collector[’']?s${GAP}Edition`, 'CollEd', true),
  rule(`Special${GAP}Edition`, 'SpecEd', true),
  rule(`Student${GAP}Edition`, 'StuEd', true),
  rule('Edition', 'Ed'),
  rule('Release', 'Rel'),
  rule('Volume', 'Vol'),
  rule('Vol\\.', 'Vol'),
  rule('Part', 'Pt'),
  rule('Number', 'No')
])

/**
 * Phrases that mark an edition, volume or part and survive subtitle
 * truncation in the title resolver.
 */
const NUMBERED_MARKER = '(?:Volume|Vol\\.?|Part|Number|No\\.|Release)'

export const EDITION_MARKERS: readonly RegExp[] = Object.freeze([
  ...ABBREVIATION_RULES.filter(r => r.edition).map(r => r.pattern),
  new RegExp(`${START}${NUMBERED_MARKER}${GAP}(?:\\d+|[IVXLC]+)${END}`, 'giu')
])

export function abbreviate(title: string): string {
  return ABBREVIATION_RULES.reduce((value, { pattern, replace }) => {
    pattern.lastIndex = 0
    return value.replace(pattern, replace)
  }, title)
}

export function findEditionMarkers(text: string): string[] {
  const found: Array<{ index: number; text: string }> = []
  for (const marker of EDITION_MARKERS) {
    for (const match of text.matchAll(marker)) {
      found.push({ index: match.index ?? 0, text: match[0] })
    }
  }
  return found
    .sort((a, b) => a.index - b.index)
    .map(entry => entry.text)
    .filter((value, index, all) => all.indexOf(value) === index)
}

export function hasEditionMarker(text: string): boolean {
  return findEditionMarkers(text).length > 0
}
