/**
 * Inflected Surface Forms
 *
 * Generates a bounded set of folded surface forms for an entity name from
 * fixed suffix-substitution rules:
 * - every single token through the first matching rule
 * - phrase variants with the first or the last token inflected
 * - noun + adjective pairs inflected together ("gradina botanica" ->
 *   "gradinii botanice")
 *
 * @module @worldgrade/language/inflection
 */

import { fold } from '@worldgrade/core';
import type { Lemmatizer } from './collaborators.js';
import type { InflectionTable } from './lexicon.js';
import { tokenizeWords } from './tokenizer.js';

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

/**
 * Forms of one folded token; the token itself is always first
 */
export function inflectToken(token: string, table: InflectionTable): string[] {
  const forms = [token];
  if (token.length < table.minTokenLength) {
    return forms;
  }

  const last = token.charAt(token.length - 1);
  const rule = table.rules.find((r) => {
    if (!token.endsWith(r.ending)) return false;
    if (r.when === 'consonant') return /\p{L}/u.test(last) && !VOWELS.has(last);
    return true;
  });
  if (!rule) {
    return forms;
  }

  const stem = token.slice(0, token.length - rule.ending.length);
  for (const replacement of rule.replacements) {
    const form = stem + replacement;
    if (form.length > 0 && !forms.includes(form)) {
      forms.push(form);
    }
  }
  return forms;
}

/**
 * Folded candidate forms for a name, the name itself first
 */
export function surfaceForms(name: string, table: InflectionTable): string[] {
  const tokens = fold(name).split(' ').filter((t) => t.length > 0);
  if (tokens.length === 0) {
    return [];
  }

  const forms = new Set<string>([tokens.join(' ')]);
  const tokenForms = tokens.map((t) => inflectToken(t, table));

  if (tokens.length === 1) {
    tokenForms[0].forEach((f) => forms.add(f));
    return [...forms];
  }

  // First two tokens together (covers first-only as well)
  const rest = tokens.slice(2);
  for (const first of tokenForms[0]) {
    for (const second of tokenForms[1]) {
      forms.add([first, second, ...rest].join(' '));
    }
  }

  // Last token only
  const head = tokens.slice(0, -1);
  for (const lastForm of tokenForms[tokens.length - 1]) {
    forms.add([...head, lastForm].join(' '));
  }

  return [...forms];
}

/**
 * True when the lemma sequence of `name` occurs contiguously in `text`
 */
export function lemmaMentions(name: string, text: string, lemmatizer: Lemmatizer): boolean {
  const lemmas = (value: string): string[] => tokenizeWords(value).map((w) => fold(lemmatizer.lemmatize(w)));

  const needle = lemmas(name);
  const haystack = lemmas(text);
  if (needle.length === 0 || needle.length > haystack.length) {
    return false;
  }

  for (let i = 0; i + needle.length <= haystack.length; i++) {
    if (needle.every((lemma, j) => haystack[i + j] === lemma)) {
      return true;
    }
  }
  return false;
}
