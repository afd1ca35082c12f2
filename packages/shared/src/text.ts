/**
 * Display-width helpers for fixed-width terminal output.
 *
 * East Asian wide and fullwidth characters (and most emoji) occupy two
 * terminal columns; control characters and combining marks occupy none.
 * Box-drawing characters count as one column.
 */

const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f], // Hangul Jamo
  [0x2e80, 0x303e], // CJK radicals, Kangxi, CJK symbols
  [0x3041, 0x33ff], // Hiragana, Katakana, Bopomofo, CJK compatibility
  [0x3400, 0x4dbf], // CJK extension A
  [0x4e00, 0x9fff], // CJK unified ideographs
  [0xa000, 0xa4cf], // Yi
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK compatibility ideographs
  [0xfe30, 0xfe4f], // CJK compatibility forms
  [0xff00, 0xff60], // Fullwidth forms
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f], // Misc symbols and pictographs, emoticons
  [0x1f900, 0x1f9ff], // Supplemental symbols and pictographs
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

const ZERO_WIDTH_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0300, 0x036f], // combining diacritics
  [0x200b, 0x200f], // zero-width space / joiners / marks
  [0xfe00, 0xfe0f], // variation selectors
];

function inRanges(cp: number, ranges: ReadonlyArray<readonly [number, number]>): boolean {
  for (const [lo, hi] of ranges) {
    if (cp < lo) return false;
    if (cp <= hi) return true;
  }
  return false;
}

/**
 * Columns taken by a single code point.
 */
export function charWidth(cp: number): number {
  if (cp < 0x20 || (cp >= 0x7f && cp < 0xa0)) return 0;
  if (inRanges(cp, ZERO_WIDTH_RANGES)) return 0;
  return inRanges(cp, WIDE_RANGES) ? 2 : 1;
}

/**
 * Columns taken by a string.
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    width += charWidth(ch.codePointAt(0) ?? 0);
  }
  return width;
}

export const TAB_SIZE = 8;

/**
 * Replace tabs with spaces up to the next tab stop, so a line's display
 * width is what the terminal will actually draw.
 */
export function expandTabs(text: string, tabSize: number = TAB_SIZE): string {
  if (!text.includes('\t')) return text;
  let result = '';
  let column = 0;
  for (const ch of text) {
    if (ch === '\t') {
      const gap = tabSize - (column % tabSize);
      result += ' '.repeat(gap);
      column += gap;
    } else {
      result += ch;
      column += charWidth(ch.codePointAt(0) ?? 0);
    }
  }
  return result;
}

export const TRUNCATION_MARKER = '…';

/**
 * Cut `text` so it fits in `maxWidth` columns. When anything is cut, the
 * result ends with `marker` (which counts toward the width).
 */
export function truncateToWidth(text: string, maxWidth: number, marker: string = TRUNCATION_MARKER): string {
  if (maxWidth <= 0) return '';
  if (displayWidth(text) <= maxWidth) return text;

  const markerWidth = displayWidth(marker);
  const suffix = markerWidth <= maxWidth ? marker : '';
  const budget = maxWidth - (suffix ? markerWidth : 0);

  let result = '';
  let used = 0;
  for (const ch of text) {
    const w = charWidth(ch.codePointAt(0) ?? 0);
    if (used + w > budget) break;
    result += ch;
    used += w;
  }
  return result + suffix;
}

/**
 * Right-pad with spaces up to `width` columns. Never cuts.
 */
export function padToWidth(text: string, width: number): string {
  const gap = width - displayWidth(text);
  return gap > 0 ? text + ' '.repeat(gap) : text;
}

/**
 * Truncate then pad, so the result is exactly `width` columns.
 */
export function fitToWidth(text: string, width: number): string {
  return padToWidth(truncateToWidth(text, width), width);
}
