/**
 * Diacritic Analyzer
 *
 * G_dia = correct / (correct + missing) over words found in the diacritic
 * lexicon. A word is "correct" when its spelling is one of the accepted
 * forms and "missing" when the marks are stripped or wrong. Defined as
 * 1.0 when no lexicon word appears.
 */

import { normalizeCedillas, stripDiacritics } from '@worldgrade/core';
import type { DiacriticLexicon } from '../lexicon.js';
import { tokenizeWords } from '../tokenizer.js';

const MAX_EXAMPLES = 10;

export interface DiacriticAnalysis {
  score: number;
  checked: number;
  correct: number;
  missing: number;
  /** Sample of offending words, "written → expected" */
  missingWords: string[];
}

export function analyzeDiacritics(text: string, lexicon: DiacriticLexicon): DiacriticAnalysis {
  let correct = 0;
  let missing = 0;
  const missingWords: string[] = [];

  for (const token of tokenizeWords(text)) {
    const written = normalizeCedillas(token.toLowerCase());
    const forms = lexicon.words.get(stripDiacritics(written));
    if (!forms) continue;

    if (forms.includes(written)) {
      correct++;
    } else {
      missing++;
      if (missingWords.length < MAX_EXAMPLES) {
        missingWords.push(`${token} → ${forms[0]}`);
      }
    }
  }

  const checked = correct + missing;
  return {
    score: checked === 0 ? 1 : correct / checked,
    checked,
    correct,
    missing,
    missingWords,
  };
}
