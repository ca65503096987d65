/**
 * @worldgrade/language
 *
 * Fixed-lexicon language analysis: tokenizer, diacritic, contamination,
 * length and grammar components of the G score, and inflected surface
 * forms for the faithfulness matcher.
 */

export * from './tokenizer.js';
export * from './lexicon.js';
export * from './collaborators.js';
export * from './inflection.js';
export * from './analyzers/diacritics.js';
export * from './analyzers/contamination.js';
export * from './analyzers/length.js';
export * from './analyzers/grammar.js';
export * from './analyzers/quality.js';
