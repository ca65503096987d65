/**
 * Lexicon Loading
 *
 * The diacritic list, the contamination word list and the inflection rules
 * are fixed configuration data. They are read from JSON once, validated
 * with zod and frozen; analyzers receive them by reference. Tests inject
 * smaller synthetic lexicons through `createLexicons`.
 *
 * @module @worldgrade/language/lexicon
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError, formatIssues } from '@worldgrade/core';

// ============================================================================
// Zod Schemas
// ============================================================================

export const DiacriticLexiconSchema = z.object({
  language: z.string(),
  description: z.string().optional(),
  words: z
    .record(z.array(z.string().min(1)).min(1))
    .describe('Stripped lower-case form -> accepted diacritised spellings'),
});

export const ContaminationLexiconSchema = z.object({
  language: z.string(),
  description: z.string().optional(),
  foreign: z.array(z.string().min(1)).min(1),
  allowList: z.array(z.string().min(1)).default([]),
});

export const InflectionRuleSchema = z.object({
  ending: z.string(),
  when: z.enum(['consonant']).optional(),
  replacements: z.array(z.string()).min(1),
});

export const InflectionTableSchema = z.object({
  language: z.string(),
  description: z.string().optional(),
  minTokenLength: z.number().int().min(1).default(3),
  rules: z.array(InflectionRuleSchema),
});

export type DiacriticLexiconFile = z.input<typeof DiacriticLexiconSchema>;
export type ContaminationLexiconFile = z.input<typeof ContaminationLexiconSchema>;
export type InflectionTableFile = z.input<typeof InflectionTableSchema>;
export type InflectionRule = z.infer<typeof InflectionRuleSchema>;

// ============================================================================
// Runtime Types
// ============================================================================

export interface DiacriticLexicon {
  readonly words: ReadonlyMap<string, readonly string[]>;
}

export interface ContaminationLexicon {
  readonly foreign: ReadonlySet<string>;
  readonly allowList: ReadonlySet<string>;
}

export interface InflectionTable {
  readonly minTokenLength: number;
  readonly rules: readonly InflectionRule[];
}

export interface LanguageLexicons {
  readonly language: string;
  readonly diacritics: DiacriticLexicon;
  readonly contamination: ContaminationLexicon;
  readonly inflection: InflectionTable;
}

export interface LexiconSources {
  diacritics: unknown;
  contamination: unknown;
  inflection: unknown;
}

// ============================================================================
// Construction
// ============================================================================

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, source: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error.errors);
    throw new ConfigurationError(`Invalid lexicon ${source}:\n${issues.map((i) => `  - ${i}`).join('\n')}`, {
      source,
      issues,
    });
  }
  return result.data;
}

/**
 * Build immutable lexicons from decoded JSON documents
 */
export function createLexicons(sources: LexiconSources, origin = '<inline>'): LanguageLexicons {
  const diacritics = validate(DiacriticLexiconSchema, sources.diacritics, `${origin}/diacritics`);
  const contamination = validate(ContaminationLexiconSchema, sources.contamination, `${origin}/contamination`);
  const inflection = validate(InflectionTableSchema, sources.inflection, `${origin}/inflection`);

  const words = new Map<string, readonly string[]>();
  for (const [stripped, forms] of Object.entries(diacritics.words)) {
    words.set(stripped.toLowerCase(), Object.freeze(forms.map((f) => f.toLowerCase())));
  }

  return Object.freeze({
    language: diacritics.language,
    diacritics: Object.freeze({ words }),
    contamination: Object.freeze({
      foreign: new Set(contamination.foreign.map((w) => w.toLowerCase())),
      allowList: new Set(contamination.allowList.map((w) => w.toLowerCase())),
    }),
    inflection: Object.freeze({
      minTokenLength: inflection.minTokenLength,
      rules: Object.freeze(inflection.rules.map((rule) => Object.freeze({ ...rule }))),
    }),
  });
}

// ============================================================================
// Loaders
// ============================================================================

const DEFAULT_LEXICON_DIR = fileURLToPath(new URL('../data/ro/', import.meta.url));

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Lexicon file not found: ${filePath}`, { source: filePath });
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Lexicon file is not valid JSON: ${filePath}`, {
      source: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Load lexicons from a directory holding diacritics.json,
 * contamination.json and inflection.json
 */
export function loadLexicons(directory: string = DEFAULT_LEXICON_DIR): LanguageLexicons {
  const dir = path.resolve(directory);
  return createLexicons(
    {
      diacritics: readJson(path.join(dir, 'diacritics.json')),
      contamination: readJson(path.join(dir, 'contamination.json')),
      inflection: readJson(path.join(dir, 'inflection.json')),
    },
    dir
  );
}

let defaultLexicons: LanguageLexicons | null = null;

/**
 * The bundled Romanian lexicons, loaded on first use and shared read-only
 */
export function getDefaultLexicons(): LanguageLexicons {
  if (!defaultLexicons) {
    defaultLexicons = loadLexicons();
  }
  return defaultLexicons;
}
