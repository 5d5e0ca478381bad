const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3040, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd]
]

/**
 * Columns a character takes in a terminal (2 for CJK, 1 for others)
 */
export function charWidth(char: string): number {
  const code = char.codePointAt(0) ?? 0
  return WIDE_RANGES.some(([from, to]) => code >= from && code <= to) ? 2 : 1
}

export function displayWidth(text: string): number {
  let width = 0
  for (const char of text) {
    width += charWidth(char)
  }
  return width
}

/**
 * Truncate text to fit maximum width (adds ".." if exceeded)
 */
export function truncateText(text: string, maxWidth: number): string {
  if (maxWidth < 3) {
    return ''
  }
  if (displayWidth(text) <= maxWidth) {
    return text
  }

  let currentWidth = 0
  let result = ''
  for (const char of text) {
    const width = charWidth(char)
    if (currentWidth + width > maxWidth - 2) break
    result += char
    currentWidth += width
  }
  return `${result}..`
}

export function getTerminalWidth(): number {
  return process.stdout.columns || 80
}
