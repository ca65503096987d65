/**
 * Collaborator Interfaces
 *
 * Optional services injected into the analyzers. The core works without
 * them, with reduced precision.
 *
 * @module @worldgrade/language/collaborators
 */

export type GrammarIssueCategory = 'grammar' | 'misspelling' | 'typographical' | 'style';

export interface GrammarIssue {
  category: GrammarIssueCategory;
  message: string;
  /** Offset of the flagged span in the checked text */
  offset: number;
  length: number;
}

/**
 * External grammar checking service
 */
export interface GrammarChecker {
  check(text: string): GrammarIssue[];
}

/**
 * External lemmatization service
 */
export interface Lemmatizer {
  lemmatize(word: string): string;
}
