/**
 * Text Folding
 *
 * Case- and diacritic-insensitive comparison keys. Every lookup of a name,
 * alias or slot key goes through `fold`.
 *
 * @module @worldgrade/core/text/fold
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_WORD = /[^\p{L}\p{N}]+/gu;

/**
 * Replace cedilla variants (ş ţ) with the comma-below forms (ș ț)
 */
export function normalizeCedillas(text: string): string {
  return text
    .replace(/ş/g, 'ș')
    .replace(/Ş/g, 'Ș')
    .replace(/ţ/g, 'ț')
    .replace(/Ţ/g, 'Ț');
}

/**
 * Remove diacritical marks, keeping case and punctuation
 */
export function stripDiacritics(text: string): string {
  return text.normalize('NFD').replace(COMBINING_MARKS, '').normalize('NFC');
}

/**
 * Lower-case, strip diacritics, turn punctuation into spaces, collapse whitespace
 */
export function fold(text: string): string {
  return stripDiacritics(text).toLowerCase().replace(NON_WORD, ' ').trim();
}

/**
 * True when `needle` occurs in `haystack` after both are folded
 */
export function foldedIncludes(haystack: string, needle: string): boolean {
  const folded = fold(needle);
  return folded.length > 0 && fold(haystack).includes(folded);
}
