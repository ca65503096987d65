/**
 * Evaluation Configuration
 *
 * YAML-loadable settings for the quality analyzer and the generator.
 * Loaded once, validated with zod, then passed by reference into every
 * evaluation call. A malformed file is a ConfigurationError.
 *
 * @module @worldgrade/core/config/evaluation-config
 */

import { z } from 'zod';
import * as yaml from 'yaml';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, formatIssues } from '../errors.js';

const WEIGHT_TOLERANCE = 0.001;

// ============================================================================
// Zod Schemas
// ============================================================================

const weight = z.number().min(0).max(1);

export const QualityWeightsSchema = z.object({
  diacritics: weight.default(0.5).describe('Weight of G_dia'),
  contamination: weight.default(0.3).describe('Weight of G_cs'),
  length: weight.default(0.2).describe('Weight of G_len'),
});

export const GrammarWeightsSchema = z.object({
  diacritics: weight.default(0.4),
  contamination: weight.default(0.25),
  length: weight.default(0.15),
  grammar: weight.default(0.2).describe('Weight of the injected grammar checker component'),
});

export const EvaluationConfigSchema = z.object({
  quality: z
    .object({
      weights: QualityWeightsSchema.default({}),
      grammarWeights: GrammarWeightsSchema.default({}),
      lengthThreshold: z.number().int().positive().default(50).describe('Word count at which G_len reaches 1.0'),
    })
    .default({}),
  generation: z
    .object({
      maxAttempts: z.number().int().positive().default(25).describe('Re-sampling budget per world'),
    })
    .default({}),
});

// ============================================================================
// Types (inferred from schemas)
// ============================================================================

export type QualityWeights = z.infer<typeof QualityWeightsSchema>;
export type GrammarWeights = z.infer<typeof GrammarWeightsSchema>;
export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;

// ============================================================================
// Validation
// ============================================================================

function sumOf(weights: Record<string, number>): number {
  return Object.values(weights).reduce((sum, w) => sum + w, 0);
}

/**
 * Validate a decoded document and check that weight groups sum to 1
 */
export function validateEvaluationConfig(value: unknown, source: string): EvaluationConfig {
  const result = EvaluationConfigSchema.safeParse(value ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error.errors);
    throw new ConfigurationError(`Invalid evaluation config in ${source}:\n${issues.map((i) => `  - ${i}`).join('\n')}`, {
      source,
      issues,
    });
  }

  const config = result.data;
  const groups: Array<[string, Record<string, number>]> = [
    ['quality.weights', config.quality.weights],
    ['quality.grammarWeights', config.quality.grammarWeights],
  ];
  for (const [name, weights] of groups) {
    const total = sumOf(weights);
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      throw new ConfigurationError(`${name} must sum to 1.0, got ${total.toFixed(3)}`, {
        source,
        issues: [`${name}: sum is ${total.toFixed(3)}`],
      });
    }
  }

  return config;
}

// ============================================================================
// Loaders
// ============================================================================

/**
 * Load and validate a config from a YAML file
 */
export function loadEvaluationConfig(filePath: string): EvaluationConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, { source: absolutePath });
  }

  return parseEvaluationConfig(fs.readFileSync(absolutePath, 'utf-8'), absolutePath);
}

/**
 * Parse a config from a YAML string
 */
export function parseEvaluationConfig(yamlContent: string, source = '<inline>'): EvaluationConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(yamlContent);
  } catch (error) {
    throw new ConfigurationError(`Config in ${source} is not valid YAML`, {
      source,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return validateEvaluationConfig(parsed, source);
}

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = EvaluationConfigSchema.parse({});
