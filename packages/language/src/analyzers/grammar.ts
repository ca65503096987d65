/**
 * Grammar Component
 *
 * Turns the issues reported by an injected GrammarChecker into a score:
 * G_gram = exp(-2.5 * weighted_errors / words). Misspellings of
 * capitalised tokens are dropped as proper nouns.
 */

import type { GrammarIssue, GrammarIssueCategory } from '../collaborators.js';

const DECAY = 2.5;

/**
 * Severity weight per issue category
 */
export const GRAMMAR_SEVERITY: Record<GrammarIssueCategory, number> = {
  grammar: 3,
  misspelling: 2,
  typographical: 1,
  style: 1,
};

export interface GrammarAnalysis {
  score: number;
  issues: number;
  ignoredProperNouns: number;
  weightedErrors: number;
  byCategory: Record<GrammarIssueCategory, number>;
}

function isProperNounSpan(text: string, issue: GrammarIssue): boolean {
  const first = text.charAt(issue.offset);
  return first.length > 0 && first !== first.toLowerCase() && first === first.toUpperCase();
}

export function scoreGrammar(text: string, issues: readonly GrammarIssue[], wordCount: number): GrammarAnalysis {
  const byCategory: Record<GrammarIssueCategory, number> = {
    grammar: 0,
    misspelling: 0,
    typographical: 0,
    style: 0,
  };
  let ignoredProperNouns = 0;
  let weightedErrors = 0;

  for (const issue of issues) {
    if (issue.category === 'misspelling' && isProperNounSpan(text, issue)) {
      ignoredProperNouns++;
      continue;
    }
    byCategory[issue.category]++;
    weightedErrors += GRAMMAR_SEVERITY[issue.category];
  }

  return {
    score: Math.exp((-DECAY * weightedErrors) / Math.max(wordCount, 1)),
    issues: issues.length - ignoredProperNouns,
    ignoredProperNouns,
    weightedErrors,
    byCategory,
  };
}
