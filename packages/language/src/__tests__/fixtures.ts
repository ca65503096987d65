import { createLexicons, type LanguageLexicons } from '../lexicon.js';

/**
 * Small synthetic lexicon set for analyzer tests
 */
export function syntheticLexicons(): LanguageLexicons {
  return createLexicons({
    diacritics: {
      language: 'ro',
      words: { si: ['și'], fara: ['fără'], in: ['în'], tara: ['țară', 'țara'] },
    },
    contamination: {
      language: 'ro',
      foreign: ['the', 'and', 'with', 'in', 'plan'],
      allowList: ['in', 'plan'],
    },
    inflection: {
      language: 'ro',
      rules: [
        { ending: 'a', replacements: ['a', 'ei'] },
        { ending: '', when: 'consonant', replacements: ['', 'ul', 'ului'] },
      ],
    },
  });
}
