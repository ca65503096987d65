/**
 * Evaluator
 *
 * parse -> U, R, G, F -> ScoreReport. The four scores are computed
 * independently from the same parse result. Nothing raised while scoring
 * one output escapes: parse failures and check errors end up in the
 * report's detail fields.
 *
 * Safe to call concurrently; every input is read-only.
 *
 * @module @worldgrade/engine/scoring/evaluator
 */

import { getLogger, type Diagnostic, type EvaluationConfig, type Instance, type Logger } from '@worldgrade/core';
import {
  analyzeQuality,
  type GrammarChecker,
  type InflectionTable,
  type LanguageLexicons,
  type Lemmatizer,
  type QualityReport,
} from '@worldgrade/language';
import { parse } from '../parser/parser.js';
import { matchFaithfulness, type FaithfulnessReport } from '../faithfulness/matcher.js';
import { scoreReasoning, scoreUnderstanding, type CheckScoreDetail } from './scores.js';

// =============================================================================
// Types
// =============================================================================

export interface EvaluateOptions {
  config: EvaluationConfig;
  lexicons: LanguageLexicons;
  /** Overrides lexicons.inflection for the faithfulness matcher */
  inflection?: InflectionTable;
  grammarChecker?: GrammarChecker;
  lemmatizer?: Lemmatizer;
  /** Receives absorbed check failures; defaults to the process logger */
  logger?: Logger;
}

export interface QualityDetail {
  G_dia: number;
  G_cs: number;
  G_len: number;
  G_gram?: number;
  weights: Record<string, number>;
  word_count: number;
  diacritics: { checked: number; correct: number; missing: number; missing_words: string[] };
  contamination: { total_words: number; foreign_words: number; flagged: string[] };
  grammar?: { issues: number; ignored_proper_nouns: number; weighted_errors: number };
  grammar_error?: string;
}

export interface FaithfulnessDetail {
  planned: string[];
  mentioned: string[];
  missing: string[];
  matched_forms: Record<string, string>;
  lemmatizer_error?: string;
}

export interface ParseDetail {
  format_ok: boolean;
  format_violation: boolean;
  repaired: boolean;
  diagnostics: Diagnostic[];
}

export interface ScoreReport {
  instance_id: string;
  U: number;
  R: number;
  G: number;
  F: number;
  U_detail: CheckScoreDetail;
  R_detail: CheckScoreDetail;
  G_detail: QualityDetail;
  F_detail: FaithfulnessDetail;
  parse: ParseDetail;
}

// =============================================================================
// Helpers
// =============================================================================

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function toQualityDetail(report: QualityReport): QualityDetail {
  const detail: QualityDetail = {
    G_dia: report.G_dia,
    G_cs: report.G_cs,
    G_len: report.G_len,
    weights: report.weights,
    word_count: report.length.wordCount,
    diacritics: {
      checked: report.diacritics.checked,
      correct: report.diacritics.correct,
      missing: report.diacritics.missing,
      missing_words: report.diacritics.missingWords,
    },
    contamination: {
      total_words: report.contamination.totalWords,
      foreign_words: report.contamination.foreignWords,
      flagged: report.contamination.flagged,
    },
  };
  if (report.G_gram !== undefined) detail.G_gram = report.G_gram;
  if (report.grammar) {
    detail.grammar = {
      issues: report.grammar.issues,
      ignored_proper_nouns: report.grammar.ignoredProperNouns,
      weighted_errors: report.grammar.weightedErrors,
    };
  }
  if (report.grammarError !== undefined) detail.grammar_error = report.grammarError;
  return detail;
}

function toFaithfulnessDetail(report: FaithfulnessReport): FaithfulnessDetail {
  const detail: FaithfulnessDetail = {
    planned: report.planned,
    mentioned: report.mentioned,
    missing: report.missing,
    matched_forms: report.matched_forms,
  };
  if (report.lemmatizer_error !== undefined) detail.lemmatizer_error = report.lemmatizer_error;
  return detail;
}

// =============================================================================
// Evaluate
// =============================================================================

/**
 * Score one raw model output against its instance
 */
export function evaluate(instance: Instance, rawOutput: string, options: EvaluateOptions): ScoreReport {
  const { world } = instance;
  const logger = options.logger ?? getLogger();
  const onAbsorbed = (checkId: string, error: unknown): void => {
    logger.checkAbsorbed(instance.instance_id, checkId, error);
  };

  const parsed = parse(rawOutput);

  const understanding = scoreUnderstanding(world, parsed.plan, parsed.format_violation, { onAbsorbed });
  const reasoning = scoreReasoning(world, parsed.plan, { onAbsorbed });

  const quality = analyzeQuality(parsed.explanation, {
    lexicons: options.lexicons,
    settings: options.config.quality,
    grammarChecker: options.grammarChecker,
  });

  // A missing plan has nothing to be faithful to
  const faithfulness: FaithfulnessReport = parsed.plan
    ? matchFaithfulness(parsed.plan, parsed.explanation, world, {
        inflection: options.inflection ?? options.lexicons.inflection,
        lemmatizer: options.lemmatizer,
      })
    : { F: 0, planned: [], mentioned: [], missing: [], matched_forms: {} };

  return {
    instance_id: instance.instance_id,
    U: clampScore(understanding.U),
    R: clampScore(reasoning.R),
    G: clampScore(quality.G),
    F: clampScore(faithfulness.F),
    U_detail: understanding.detail,
    R_detail: reasoning.detail,
    G_detail: toQualityDetail(quality),
    F_detail: toFaithfulnessDetail(faithfulness),
    parse: {
      format_ok: parsed.format_ok,
      format_violation: parsed.format_violation,
      repaired: parsed.repaired,
      diagnostics: parsed.diagnostics,
    },
  };
}
