/**
 * Language-Quality (G) Analyzer
 *
 * Combines three independent sub-scores over the explanation text:
 *
 *   G = w_dia * G_dia + w_cs * G_cs + w_len * G_len
 *
 * When a GrammarChecker is injected, a fourth component is added and the
 * grammar weight set is used instead. Same input always produces the
 * same output.
 *
 * @module @worldgrade/language/analyzers/quality
 */

import type { EvaluationConfig } from '@worldgrade/core';
import type { GrammarChecker } from '../collaborators.js';
import type { LanguageLexicons } from '../lexicon.js';
import { analyzeContamination, type ContaminationAnalysis } from './contamination.js';
import { analyzeDiacritics, type DiacriticAnalysis } from './diacritics.js';
import { scoreGrammar, type GrammarAnalysis } from './grammar.js';
import { analyzeLength, type LengthAnalysis } from './length.js';

// =============================================================================
// Types
// =============================================================================

export type QualitySettings = EvaluationConfig['quality'];

export interface QualityOptions {
  lexicons: LanguageLexicons;
  settings: QualitySettings;
  grammarChecker?: GrammarChecker;
}

export interface QualityReport {
  G: number;
  G_dia: number;
  G_cs: number;
  G_len: number;
  G_gram?: number;
  weights: Record<string, number>;
  diacritics: DiacriticAnalysis;
  contamination: ContaminationAnalysis;
  length: LengthAnalysis;
  grammar?: GrammarAnalysis;
  /** Set when the grammar checker failed and the three-way weights were used */
  grammarError?: string;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

// =============================================================================
// Analyzer
// =============================================================================

export function analyzeQuality(text: string, options: QualityOptions): QualityReport {
  const { lexicons, settings } = options;

  const diacritics = analyzeDiacritics(text, lexicons.diacritics);
  const contamination = analyzeContamination(text, lexicons.contamination);
  const length = analyzeLength(text, settings.lengthThreshold);

  const base = {
    G_dia: diacritics.score,
    G_cs: contamination.score,
    G_len: length.score,
    diacritics,
    contamination,
    length,
  };

  if (options.grammarChecker) {
    try {
      const grammar = scoreGrammar(text, options.grammarChecker.check(text), length.wordCount);
      const w = settings.grammarWeights;
      const G =
        w.diacritics * diacritics.score +
        w.contamination * contamination.score +
        w.length * length.score +
        w.grammar * grammar.score;
      return { ...base, G: clamp01(G), G_gram: grammar.score, grammar, weights: { ...w } };
    } catch (error) {
      const w = settings.weights;
      const G = w.diacritics * diacritics.score + w.contamination * contamination.score + w.length * length.score;
      return {
        ...base,
        G: clamp01(G),
        weights: { ...w },
        grammarError: error instanceof Error ? error.message : String(error),
      };
    }
  }

  const w = settings.weights;
  const G = w.diacritics * diacritics.score + w.contamination * contamination.score + w.length * length.score;
  return { ...base, G: clamp01(G), weights: { ...w } };
}
