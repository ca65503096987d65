/**
 * Contamination Analyzer
 *
 * G_cs = 1 - foreign / total over all words. Native words spelled like
 * foreign ones are excluded through the allow-list.
 */

import type { ContaminationLexicon } from '../lexicon.js';
import { tokenizeWords } from '../tokenizer.js';

const MAX_EXAMPLES = 10;

export interface ContaminationAnalysis {
  score: number;
  totalWords: number;
  foreignWords: number;
  flagged: string[];
}

export function isForeignWord(word: string, lexicon: ContaminationLexicon): boolean {
  const lower = word.toLowerCase();
  return lexicon.foreign.has(lower) && !lexicon.allowList.has(lower);
}

export function analyzeContamination(text: string, lexicon: ContaminationLexicon): ContaminationAnalysis {
  const words = tokenizeWords(text);
  const flagged: string[] = [];
  let foreignWords = 0;

  for (const word of words) {
    if (isForeignWord(word, lexicon)) {
      foreignWords++;
      if (flagged.length < MAX_EXAMPLES && !flagged.includes(word.toLowerCase())) {
        flagged.push(word.toLowerCase());
      }
    }
  }

  return {
    score: words.length === 0 ? 1 : 1 - foreignWords / words.length,
    totalWords: words.length,
    foreignWords,
    flagged,
  };
}
