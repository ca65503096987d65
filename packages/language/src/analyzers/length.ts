import { countWords } from '../tokenizer.js';

export interface LengthAnalysis {
  score: number;
  wordCount: number;
  threshold: number;
}

/**
 * G_len = min(1, words / threshold)
 */
export function analyzeLength(text: string, threshold: number): LengthAnalysis {
  const wordCount = countWords(text);
  const score = threshold > 0 ? Math.min(1, wordCount / threshold) : 1;
  return { score, wordCount, threshold };
}
