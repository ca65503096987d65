/**
 * Word Tokenizer
 *
 * A word starts with a letter and may continue with letters or digits
 * ("day1"), joined by hyphens or apostrophes ("într-o", "n-am").
 * Bare numbers and punctuation are not words. Text is composed to NFC
 * first so decomposed diacritics stay inside their word.
 *
 * @module @worldgrade/language/tokenizer
 */

const WORD_PATTERN = /\p{L}[\p{L}\p{N}]*(?:[-'’]\p{L}[\p{L}\p{N}]*)*/gu;

export function tokenizeWords(text: string): string[] {
  return text.normalize('NFC').match(WORD_PATTERN) ?? [];
}

export function countWords(text: string): number {
  return tokenizeWords(text).length;
}
